import { vi } from "vitest";

/**
 * Thrown by a recording IO's `exit`, so that code calling `exit` stops the
 * way a real process would.
 */
export class ProcessExit extends Error {
  readonly code: number;

  constructor(code: number) {
    super(`process exited with code ${code}`);
    this.name = "ProcessExit";
    this.code = code;
  }
}

/**
 * ProcessIO double that records every printed line.
 */
export interface RecordingIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly exit: (code: number) => never;
  /** Lines printed to stdout, in order */
  readonly out: string[];
  /** Lines printed to stderr, in order */
  readonly err: string[];
}

/**
 * Create a recording ProcessIO. All methods are vitest mock functions.
 *
 * @example
 * ```typescript
 * const io = createRecordingIO();
 * const exit = captureExit(() => parseComplete(args, { argv: ["--help"], io }));
 * expect(exit.code).toBe(0);
 * expect(io.out).toHaveLength(1);
 * ```
 */
export function createRecordingIO(): RecordingIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: vi.fn<(line: string) => void>((line) => {
      out.push(line);
    }),
    stderr: vi.fn<(line: string) => void>((line) => {
      err.push(line);
    }),
    exit: vi.fn<(code: number) => never>((code) => {
      throw new ProcessExit(code);
    }),
  };
}

/**
 * Run `fn`, expecting it to call a recording IO's `exit`.
 */
export function captureExit(fn: () => unknown): ProcessExit {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProcessExit) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the process to exit");
}
