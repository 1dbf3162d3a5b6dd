import { isValidationError, type ValidationError } from "@argot/errors";
import { describe, expect, it } from "vitest";
import {
  createDescription,
  DescriptionOptionsSchema,
  type DescriptionOptions,
  defineLanguage,
  ENGLISH,
} from "../../index.js";

function rejectionOf(options: DescriptionOptions<unknown>): ValidationError {
  try {
    createDescription(options);
  } catch (error) {
    if (isValidationError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected createDescription to throw");
}

describe("createDescription", () => {
  it("should take prefixes from the language", () => {
    const description = createDescription({ long: "verbose", short: "v" });

    expect(description.longPrefix.text).toBe("--");
    expect(description.shortPrefix.text).toBe("-");
    expect(description.long.map((name) => name.text)).toEqual(["verbose"]);
    expect(description.short.map((name) => name.text)).toEqual(["v"]);
  });

  it("should use the prefixes of another language", () => {
    const plus = defineLanguage({ ...ENGLISH, longPrefix: "++", shortPrefix: "+" });
    const description = createDescription({ long: "x" }, plus);

    expect(description.longPrefix.text).toBe("++");
    expect(description.shortPrefix.text).toBe("+");
  });

  it("should prefer explicit prefixes", () => {
    const description = createDescription({ long: "x", longPrefix: "/", shortPrefix: "/" });

    expect(description.longPrefix.text).toBe("/");
    expect(description.shortPrefix.text).toBe("/");
  });

  it("should keep aliases in order", () => {
    const description = createDescription({ long: ["name", "user"], short: ["n", "u"] });

    expect(description.long.map((name) => name.text)).toEqual(["name", "user"]);
    expect(description.short.map((name) => name.text)).toEqual(["n", "u"]);
  });

  it("should wrap the default", () => {
    expect(createDescription({ long: "count", default: 0 }).default).toEqual({ value: 0 });
    expect(createDescription({ long: "count" }).default).toBeUndefined();
  });

  it("should be case-insensitive unless asked", () => {
    expect(createDescription({ long: "x" }).caseSensitive).toBe(false);

    const strict = createDescription({ long: "x", caseSensitive: true });
    expect(strict.caseSensitive).toBe(true);
    expect(strict.long[0].caseSensitive).toBe(true);
  });

  it("should keep help text", () => {
    expect(createDescription({ long: "x", help: "Does x." }).help).toBe("Does x.");
    expect(createDescription({ long: "x" }).help).toBeUndefined();
  });

  it("should reject an empty long name", () => {
    const error = rejectionOf({ long: "" });

    expect(error.code).toBe("ARGUMENT_DESCRIPTION_INVALID");
    expect(error.message).toBe("Invalid argument description: long: Must not be empty");
    expect(error.issues.map((issue) => issue.field)).toEqual(["long"]);
  });

  it("should reject a short name of more than one grapheme", () => {
    const error = rejectionOf({ long: "x", short: "ab" });

    expect(error.issues.map((issue) => issue.field)).toEqual(["short"]);
    expect(error.issues[0]?.message).toBe("Must be exactly one grapheme");
  });

  it("should accept a decomposed grapheme as short name", () => {
    expect(createDescription({ long: "x", short: "e\u0301" }).short).toHaveLength(1);
  });

  it("should reject an empty prefix", () => {
    const error = rejectionOf({ long: "x", longPrefix: "" });

    expect(error.issues.map((issue) => issue.field)).toEqual(["longPrefix"]);
  });

  it("should reject an empty long name list", () => {
    expect(DescriptionOptionsSchema.safeParse({ long: [] }).success).toBe(false);
  });
});
