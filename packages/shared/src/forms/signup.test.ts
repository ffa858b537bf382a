import { describe, expect, it } from "vitest";
import {
  initialSignupState,
  signupReducer,
  validateSignup,
  type SignupField,
  type SignupForm,
  type SignupState,
} from "./signup.js";

const valid: SignupForm = {
  name: "  Ada  ",
  email: "ada@example.com",
  password: "password1",
  confirmPassword: "password1",
};

describe("validateSignup", () => {
  it("accepts a complete form", () => {
    expect(validateSignup(valid)).toEqual({ ok: true, data: valid });
  });

  it("reports one message per failing field", () => {
    expect(
      validateSignup({ name: " ", email: "ada@", password: "abc", confirmPassword: "abd" })
    ).toEqual({
      ok: false,
      errors: {
        name: "Name is required",
        email: "Enter a valid email address",
        password: "Password must be at least 8 characters",
        confirmPassword: "Passwords do not match",
      },
    });
  });

  it("checks password rules in order", () => {
    const result = validateSignup({ ...valid, password: "longenough", confirmPassword: "longenough" });

    expect(result).toEqual({ ok: false, errors: { password: "Password must contain a number" } });
  });
});

describe("signupReducer", () => {
  const fields: SignupField[] = ["name", "email", "password", "confirmPassword"];

  function typeInto(state: SignupState, form: SignupForm): SignupState {
    return fields.reduce(
      (current, field) => signupReducer(current, { type: "fieldChanged", field, value: form[field] }),
      state
    );
  }

  it("hides errors until the first submit", () => {
    const state = signupReducer(initialSignupState, {
      type: "fieldChanged",
      field: "email",
      value: "nope",
    });

    expect(state.errors).toEqual({});
    expect(state.form.email).toBe("nope");
  });

  it("shows errors after a failed submit and clears them as fields are fixed", () => {
    const submitted = signupReducer(initialSignupState, { type: "submitted" });
    expect(submitted.attempted).toBe(true);
    expect(submitted.errors.name).toBe("Name is required");

    const fixed = signupReducer(submitted, { type: "fieldChanged", field: "name", value: "Ada" });
    expect(fixed.errors.name).toBeUndefined();
    expect(fixed.errors.email).toBe("Enter a valid email address");
  });

  it("records the trimmed name on a valid submit", () => {
    const filled = typeInto(initialSignupState, valid);
    const submitted = signupReducer(filled, { type: "submitted" });

    expect(submitted.errors).toEqual({});
    expect(submitted.submittedAs).toBe("Ada");
  });

  it("resets to the empty form", () => {
    const filled = typeInto(initialSignupState, valid);

    expect(signupReducer(filled, { type: "reset" })).toBe(initialSignupState);
  });
});
