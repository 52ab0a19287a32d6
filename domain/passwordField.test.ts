import { describe, expect, it } from "vitest";
import { clearValidation, createPasswordField, updatePassword } from "./passwordField.js";
import { builder, defaultRules } from "./passwordValidator.js";
import { errorDescriptions } from "./validationResult.js";

describe("password field", () => {
  const validator = defaultRules();

  it("starts empty with no result", () => {
    expect(createPasswordField()).toEqual({ password: "", result: null });
  });

  it("updatePassword validates the new value", () => {
    const state = updatePassword(createPasswordField(), "pass", validator);
    expect(state.password).toBe("pass");
    expect(state.result?.isValid).toBe(false);
    expect(errorDescriptions(state.result)).toEqual([
      "Password must be at least 8 characters long",
      "Password must include an uppercase letter",
      "Password must include a number",
      "Password must include a special character",
    ]);
  });

  it("each update replaces the previous result", () => {
    const first = updatePassword(createPasswordField(), "pass", validator);
    const second = updatePassword(first, "Password123!", validator);
    expect(second.result).toEqual({ isValid: true, errors: [] });
    expect(first.result?.errors).toHaveLength(4);
  });

  it("clearValidation keeps the password", () => {
    const state = clearValidation(updatePassword(createPasswordField(), "pass", validator));
    expect(state).toEqual({ password: "pass", result: null });
  });

  it("uses whichever validator it is given", () => {
    const lenient = builder().minLength(2).build();
    const state = updatePassword(createPasswordField(), "pass", lenient);
    expect(state.result?.isValid).toBe(true);
  });
});
