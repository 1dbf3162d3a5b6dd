import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  ArgotError,
  getErrorMessage,
  hasCode,
  InternalError,
  isArgotError,
  isError,
  isExpectedError,
  isInternalError,
  issuesFromZod,
  isValidationError,
  ValidationError,
  wrapError,
} from "../../index.js";

describe("ArgotError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ArgotError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.exitCode).toBe(70);
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should support metadata and cause", () => {
    const cause = new Error("root");
    const error = new InternalError("With metadata", { scope: "flag" }, cause);

    expect(error.metadata).toEqual({ scope: "flag" });
    expect(error.cause).toBe(cause);
  });

  it("should serialize to JSON", () => {
    const error = new InternalError("JSON test", { key: "value" });
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      exitCode: 70,
      isExpected: false,
      metadata: { key: "value" },
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it("should omit metadata from JSON when absent", () => {
    expect("metadata" in new InternalError("bare").toJSON()).toBe(false);
  });
});

describe("ValidationError", () => {
  it("should read exit code and domain from the catalog", () => {
    const error = new ValidationError({
      code: "ARGUMENTS_REJECTED",
      message: "Missing Flag: --verbose",
      issues: [{ field: "verbose", message: "Missing Flag: --verbose", code: "MissingFlag" }],
    });

    expect(error.name).toBe("ValidationError");
    expect(error.code).toBe("ARGUMENTS_REJECTED");
    expect(error.exitCode).toBe(64);
    expect(error.domain).toBe("arguments");
    expect(error.isExpected).toBe(true);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.field).toBe("verbose");
  });

  it("should default to no issues", () => {
    const error = new ValidationError({ code: "ARGUMENT_OPTIONS_INVALID", message: "bad" });

    expect(error.issues).toEqual([]);
    expect(error.exitCode).toBe(78);
    expect(error.isExpected).toBe(false);
  });
});

describe("guards", () => {
  const validation = new ValidationError({ code: "ARGUMENTS_UNUSED", message: "unused" });
  const internal = new InternalError("boom");

  it("isError and isArgotError", () => {
    expect(isError(new Error("x"))).toBe(true);
    expect(isError("x")).toBe(false);
    expect(isArgotError(validation)).toBe(true);
    expect(isArgotError(new Error("x"))).toBe(false);
  });

  it("isValidationError and isInternalError", () => {
    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(internal)).toBe(false);
    expect(isInternalError(internal)).toBe(true);
    expect(isInternalError(validation)).toBe(false);
  });

  it("hasCode compares the code", () => {
    expect(hasCode(validation, "ARGUMENTS_UNUSED")).toBe(true);
    expect(hasCode(validation, "ARGUMENTS_REJECTED")).toBe(false);
  });

  it("isExpectedError", () => {
    expect(isExpectedError(validation)).toBe(true);
    expect(isExpectedError(internal)).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });
});

describe("utils", () => {
  it("wrapError passes ArgotErrors through", () => {
    const error = new InternalError("same");
    expect(wrapError(error)).toBe(error);
  });

  it("wrapError wraps plain errors in InternalError", () => {
    const wrapped = wrapError(new TypeError("bad type"));

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("bad type");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
  });

  it("wrapError wraps non-errors", () => {
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("getErrorMessage", () => {
    expect(getErrorMessage(new Error("m"))).toBe("m");
    expect(getErrorMessage("s")).toBe("s");
    expect(getErrorMessage({})).toBe("An unknown error occurred");
  });

  it("issuesFromZod maps paths and root issues", () => {
    const schema = z.object({ long: z.array(z.string()).min(1) }).strict();
    const nested = schema.safeParse({ long: [] });
    const root = z.string().safeParse(5);

    expect(nested.success).toBe(false);
    if (!nested.success) {
      const issues = issuesFromZod(nested.error);
      expect(issues).toHaveLength(1);
      expect(issues[0]?.field).toBe("long");
      expect(issues[0]?.code).toBe("too_small");
    }
    expect(root.success).toBe(false);
    if (!root.success) {
      expect(issuesFromZod(root.error, "options")[0]?.field).toBe("options");
    }
  });
});
