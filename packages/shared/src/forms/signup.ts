/**
 * @fileoverview Signup form: validation rules and the form's update loop
 *
 * This is a sketch, not a validation framework. Each field has a short list
 * of rules, checked in order; the first failing rule is the one reported.
 *
 * WHEN ERRORS SHOW:
 * A form that shouts "Name is required" before anyone has typed is
 * annoying. Errors stay hidden until the first submit, then follow every
 * keystroke so they clear as soon as the field is fixed.
 */

// ============================================================================
// TYPES
// ============================================================================

export type SignupForm = {
  name: string;
  email: string;
  password: string;
  confirmPassword: string;
};

export type SignupField = keyof SignupForm;

export type FieldErrors = Partial<Record<SignupField, string>>;

export type ValidationResult =
  | { ok: true; data: SignupForm }
  | { ok: false; errors: FieldErrors };

type Rule = {
  check: (form: SignupForm) => boolean;
  message: string;
};

// ============================================================================
// RULES
// ============================================================================

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const MIN_PASSWORD_LENGTH = 8;

const RULES: Record<SignupField, Rule[]> = {
  name: [
    { check: (f) => f.name.trim().length > 0, message: "Name is required" },
  ],
  email: [
    { check: (f) => EMAIL_PATTERN.test(f.email), message: "Enter a valid email address" },
  ],
  password: [
    {
      check: (f) => f.password.length >= MIN_PASSWORD_LENGTH,
      message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
    },
    { check: (f) => /\d/.test(f.password), message: "Password must contain a number" },
  ],
  confirmPassword: [
    { check: (f) => f.confirmPassword === f.password, message: "Passwords do not match" },
  ],
};

const FIELDS: readonly SignupField[] = ["name", "email", "password", "confirmPassword"];

/**
 * @example
 * validateSignup({ name: "", email: "ada@example.com", password: "abc", confirmPassword: "abc" });
 * // { ok: false, errors: { name: "Name is required", password: "Password must be at least 8 characters" } }
 */
export function validateSignup(form: SignupForm): ValidationResult {
  const errors: FieldErrors = {};

  for (const field of FIELDS) {
    const failed = RULES[field].find((rule) => !rule.check(form));
    if (failed) {
      errors[field] = failed.message;
    }
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, data: form };
}

// ============================================================================
// UPDATE LOOP
// ============================================================================

export type SignupState = {
  form: SignupForm;
  errors: FieldErrors;
  /** Set after the first submit; errors are only shown from then on */
  attempted: boolean;
  /** The trimmed name once a submit has passed validation */
  submittedAs: string | null;
};

export type SignupMessage =
  | { type: "fieldChanged"; field: SignupField; value: string }
  | { type: "submitted" }
  | { type: "reset" };

export const EMPTY_SIGNUP_FORM: SignupForm = {
  name: "",
  email: "",
  password: "",
  confirmPassword: "",
};

export const initialSignupState: SignupState = {
  form: EMPTY_SIGNUP_FORM,
  errors: {},
  attempted: false,
  submittedAs: null,
};

function errorsOf(result: ValidationResult): FieldErrors {
  return result.ok ? {} : result.errors;
}

/**
 * Pure reducer for the signup form; the page feeds it to `useReducer`.
 */
export function signupReducer(state: SignupState, message: SignupMessage): SignupState {
  switch (message.type) {
    case "fieldChanged": {
      const form = { ...state.form, [message.field]: message.value };
      return {
        ...state,
        form,
        errors: state.attempted ? errorsOf(validateSignup(form)) : {},
      };
    }

    case "submitted": {
      const result = validateSignup(state.form);
      return {
        ...state,
        attempted: true,
        errors: errorsOf(result),
        submittedAs: result.ok ? result.data.name.trim() : null,
      };
    }

    case "reset":
      return initialSignupState;
  }
}
