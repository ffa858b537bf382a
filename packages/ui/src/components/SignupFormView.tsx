import React from "react";
import type { FieldErrors, SignupField, SignupForm } from "@study-archive/shared";

export type SignupFormViewProps = {
  form: SignupForm;
  errors: FieldErrors;
  onChange: (field: SignupField, value: string) => void;
  onSubmit: () => void;
};

const FIELDS: Array<{ field: SignupField; label: string; type: string }> = [
  { field: "name", label: "Name", type: "text" },
  { field: "email", label: "Email", type: "email" },
  { field: "password", label: "Password", type: "password" },
  { field: "confirmPassword", label: "Confirm password", type: "password" },
];

export function SignupFormView({ form, errors, onChange, onSubmit }: SignupFormViewProps) {
  return (
    <form
      noValidate
      onSubmit={(e) => {
        e.preventDefault();
        onSubmit();
      }}
    >
      {FIELDS.map(({ field, label, type }) => {
        const error = errors[field];
        return (
          <div key={field} className="field">
            <label htmlFor={`signup-${field}`}>{label}</label>
            <input
              id={`signup-${field}`}
              type={type}
              value={form[field]}
              aria-invalid={error ? true : undefined}
              onChange={(e) => onChange(field, e.target.value)}
            />
            {error && (
              <p className="field-error" role="alert">
                {error}
              </p>
            )}
          </div>
        );
      })}
      <button type="submit">Sign up</button>
    </form>
  );
}
