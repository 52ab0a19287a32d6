import { describe, expect, it } from "vitest";
import { PasswordError, describePasswordError, isPasswordError } from "./passwordError.js";

describe("PasswordError descriptions", () => {
  it("built-in kinds map to fixed text", () => {
    expect(PasswordError.TooShort.description).toBe("Password must be at least 8 characters long");
    expect(PasswordError.MissingUppercase.description).toBe("Password must include an uppercase letter");
    expect(PasswordError.MissingDigit.description).toBe("Password must include a number");
    expect(PasswordError.MissingSpecialChar.description).toBe("Password must include a special character");
  });

  it("custom description is the message verbatim", () => {
    const error = PasswordError.custom("Password must not start with a number");
    expect(error.kind).toBe("Custom");
    expect(error.message).toBe("Password must not start with a number");
    expect(error.description).toBe("Password must not start with a number");
  });

  it("describePasswordError agrees with description for every kind", () => {
    const all: PasswordError[] = [
      PasswordError.TooShort,
      PasswordError.MissingUppercase,
      PasswordError.MissingDigit,
      PasswordError.MissingSpecialChar,
      PasswordError.custom("  spaced  "),
    ];
    for (const e of all) {
      expect(describePasswordError(e)).toBe(e.description);
    }
  });

  it("values are frozen", () => {
    expect(Object.isFrozen(PasswordError.TooShort)).toBe(true);
    expect(Object.isFrozen(PasswordError.custom("x"))).toBe(true);
  });
});

describe("isPasswordError", () => {
  it("accepts built-in and custom errors", () => {
    expect(isPasswordError(PasswordError.MissingDigit)).toBe(true);
    expect(isPasswordError(PasswordError.custom("nope"))).toBe(true);
    expect(isPasswordError({ kind: "TooShort", description: "Password must be at least 8 characters long" })).toBe(true);
  });

  it("rejects malformed values", () => {
    expect(isPasswordError(null)).toBe(false);
    expect(isPasswordError("TooShort")).toBe(false);
    expect(isPasswordError({ kind: "TooShort", description: "too short" })).toBe(false);
    expect(isPasswordError({ kind: "Custom", message: "a" })).toBe(false);
    expect(isPasswordError({ kind: "Custom", message: "a", description: "b" })).toBe(false);
    expect(isPasswordError({ kind: "TooLong", description: "x" })).toBe(false);
  });
});
