export const PACKAGE_NAME = "@argot/test-utils" as const;

export { captureExit, createRecordingIO, ProcessExit, type RecordingIO } from "./process-io.js";
export {
  expectEarlyExit,
  expectFailure,
  expectValue,
  type ParseResultLike,
} from "./results.js";
