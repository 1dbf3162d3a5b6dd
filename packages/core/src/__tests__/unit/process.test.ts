import {
  InternalError,
  isInternalError,
  isValidationError,
  ValidationError,
} from "@argot/errors";
import { captureExit, createRecordingIO } from "@argot/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  argvFromProcess,
  booleanFlag,
  combine,
  createDescription,
  GERMAN,
  helpAndVersion,
  integerValue,
  NODE_PROCESS_IO,
  parseComplete,
  parseOrThrow,
  parseWithEarlyExit,
  stringValue,
  value,
} from "../../index.js";

const program = helpAndVersion(
  combine(
    (quiet, name) => ({ quiet, name }),
    booleanFlag(createDescription({ long: "quiet", short: "q", default: false })),
    stringValue(createDescription({ long: "name", default: "world" })),
  ),
  { programName: "prog", version: "1.0" },
);

const count = integerValue(createDescription({ long: "count" }));

function validationErrorOf(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (isValidationError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ValidationError");
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseComplete", () => {
  it("should return the value when every token is used", () => {
    const io = createRecordingIO();

    expect(parseComplete(program, { argv: ["-q", "--name=x"], io })).toEqual({
      quiet: true,
      name: "x",
    });
    expect(io.exit).not.toHaveBeenCalled();
    expect(io.err).toEqual([]);
  });

  it("should reject unused tokens with exit code 1", () => {
    const io = createRecordingIO();
    const exit = captureExit(() => parseComplete(program, { argv: ["--extra"], io }));

    expect(exit.code).toBe(1);
    expect(io.err).toEqual(['Unused argument(s): ["--extra"]']);
    expect(io.out).toEqual([]);
  });

  it("should use a custom exit code", () => {
    const io = createRecordingIO();
    const exit = captureExit(() => parseComplete(program, { argv: ["x"], io, exitCode: 64 }));

    expect(exit.code).toBe(64);
  });

  it("should print early-exit messages to stdout and exit with 0", () => {
    const io = createRecordingIO();
    const exit = captureExit(() => parseComplete(program, { argv: ["--version", "x"], io }));

    expect(exit.code).toBe(0);
    expect(io.out).toEqual(["prog 1.0"]);
    expect(io.err).toEqual([]);
  });

  it("should print one line per error", () => {
    const io = createRecordingIO();
    const both = combine((a, b) => [a, b], count, booleanFlag(createDescription({ long: "force" })));
    const exit = captureExit(() => parseComplete(both, { argv: ["--count=x"], io }));

    expect(exit.code).toBe(1);
    expect(io.err).toEqual([
      "Parse Error: --count(=| )VALUE\nNot an integer: x",
      "Missing Flag: --[no-]force",
    ]);
  });

  it("should format with the given language and cause formatter", () => {
    const io = createRecordingIO();
    captureExit(() =>
      parseComplete(count, {
        argv: ["--count", "x"],
        io,
        language: GERMAN,
        formatCause: (error) => error.toUpperCase(),
      }),
    );

    expect(io.err).toEqual(["Parse-Fehler: --count(=| )VALUE\nNOT AN INTEGER: X"]);
  });

  it("should read process.argv by default", () => {
    const saved = process.argv;
    process.argv = ["node", "prog", "--quiet"];
    try {
      expect(parseComplete(program, { io: createRecordingIO() })).toEqual({
        quiet: true,
        name: "world",
      });
    } finally {
      process.argv = saved;
    }
  });

  it.each([0, 1.5])("should reject exit code %s", (exitCode) => {
    const error = validationErrorOf(() =>
      parseComplete(program, { argv: [], io: createRecordingIO(), exitCode }),
    );

    expect(error.code).toBe("ARGUMENT_OPTIONS_INVALID");
    expect(error.issues.map((issue) => issue.field)).toEqual(["exitCode"]);
  });

  it("should reject an invalid language table", () => {
    const error = validationErrorOf(() =>
      parseComplete(program, {
        argv: [],
        io: createRecordingIO(),
        language: { ...GERMAN, metaVar: "" },
      }),
    );

    expect(error.issues.map((issue) => issue.field)).toEqual(["language.metaVar"]);
  });
});

describe("parseWithEarlyExit", () => {
  it("should return values together with unused tokens", () => {
    const io = createRecordingIO();

    expect(parseWithEarlyExit(program, { argv: ["-q", "x"], io })).toEqual({
      result: { success: true, value: { quiet: true, name: "world" } },
      unused: ["x"],
    });
  });

  it("should return errors without printing", () => {
    const io = createRecordingIO();
    const { result, unused } = parseWithEarlyExit(count, { argv: [], io });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((error) => error._tag)).toEqual(["MissingValue"]);
    }
    expect(unused).toEqual([]);
    expect(io.err).toEqual([]);
  });

  it("should exit on an early exit", () => {
    const io = createRecordingIO();
    const exit = captureExit(() => parseWithEarlyExit(program, { argv: ["-h"], io }));

    expect(exit.code).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]?.startsWith("prog 1.0\n")).toBe(true);
  });
});

describe("parseOrThrow", () => {
  it("should return an accepted value", () => {
    expect(parseOrThrow(program, ["--name", "you"])).toEqual({
      _tag: "Value",
      value: { quiet: false, name: "you" },
    });
  });

  it("should return early exits even with unused tokens", () => {
    expect(parseOrThrow(program, ["--version", "x"])).toEqual({
      _tag: "EarlyExit",
      messages: ["prog 1.0"],
    });
  });

  it("should throw for argument errors", () => {
    const error = validationErrorOf(() => parseOrThrow(count, ["--count=x"]));

    expect(error.code).toBe("ARGUMENTS_REJECTED");
    expect(error.exitCode).toBe(64);
    expect(error.message).toBe("Parse Error: --count(=| )VALUE\nNot an integer: x");
    expect(error.issues).toEqual([
      {
        field: "count",
        message: "Parse Error: --count(=| )VALUE\nNot an integer: x",
        code: "ParseFailure",
      },
    ]);
  });

  it("should throw for unused tokens", () => {
    const error = validationErrorOf(() => parseOrThrow(program, ["x"]));

    expect(error.code).toBe("ARGUMENTS_UNUSED");
    expect(error.message).toBe('Unused argument(s): ["x"]');
    expect(error.issues).toEqual([
      { field: "x", message: "Unused argument(s)", code: "UnusedArgument" },
    ]);
  });
});

describe("argvFromProcess", () => {
  it("should drop the runtime and script path", () => {
    const saved = process.argv;
    process.argv = ["node", "script.js", "-a", "b"];
    try {
      expect(argvFromProcess()).toEqual(["-a", "b"]);
    } finally {
      process.argv = saved;
    }
  });
});

describe("NODE_PROCESS_IO", () => {
  it("should print through the console", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    NODE_PROCESS_IO.stdout("out");
    NODE_PROCESS_IO.stderr("err");

    expect(log).toHaveBeenCalledWith("out");
    expect(error).toHaveBeenCalledWith("err");
  });

  it("should exit the process", () => {
    const exit = vi.spyOn(process, "exit").mockImplementation((): never => {
      throw new Error("exit called");
    });

    expect(() => NODE_PROCESS_IO.exit(3)).toThrow("exit called");
    expect(exit).toHaveBeenCalledWith(3);
  });
});

describe("exceptions from caller code", () => {
  const port = value<number, string>(createDescription({ long: "port" }), {
    metaVar: "PORT",
    valueInfix: "=",
    parse: () => {
      throw new RangeError("port out of range");
    },
  });

  it("should rethrow them as InternalError", () => {
    let thrown: unknown;
    try {
      parseOrThrow(port, ["--port=1"]);
    } catch (error) {
      thrown = error;
    }

    expect(isInternalError(thrown)).toBe(true);
    if (isInternalError(thrown)) {
      expect(thrown.code).toBe("INTERNAL_ERROR");
      expect(thrown.exitCode).toBe(70);
      expect(thrown.message).toBe("port out of range");
      expect(thrown.metadata).toEqual({ originalName: "RangeError" });
      expect(thrown.cause).toBeInstanceOf(RangeError);
    }
  });

  it("should neither print nor exit", () => {
    const io = createRecordingIO();

    expect(() => parseComplete(port, { argv: ["--port=1"], io })).toThrow(InternalError);
    expect(io.exit).not.toHaveBeenCalled();
    expect(io.err).toEqual([]);
  });

  it("should wrap a throwing cause formatter", () => {
    const io = createRecordingIO();
    const formatCause = (): string => {
      throw "unprintable";
    };

    expect(() => parseComplete(count, { argv: ["--count=x"], io, formatCause })).toThrow(
      "unprintable",
    );
    expect(io.err).toEqual([]);
    expect(io.exit).not.toHaveBeenCalled();
  });

  it("should pass argot errors through unchanged", () => {
    const nested = new ValidationError({ code: "ARGUMENTS_REJECTED", message: "nested" });
    const name = value<string, string>(createDescription({ long: "name" }), {
      metaVar: "NAME",
      valueInfix: "=",
      parse: () => {
        throw nested;
      },
    });

    expect(validationErrorOf(() => parseOrThrow(name, ["--name=x"]))).toBe(nested);
  });
});
