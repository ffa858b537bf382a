import React from "react";
import { initialSignupState, signupReducer } from "@study-archive/shared";
import { SignupFormView } from "../components/SignupFormView.js";

/**
 * Local form state: nothing else needs it, so it stays out of the store.
 */
export default function SignupPage() {
  const [state, send] = React.useReducer(signupReducer, initialSignupState);

  if (state.submittedAs !== null) {
    return (
      <>
        <h2>Sign up</h2>
        <p>Thanks for signing up, {state.submittedAs}!</p>
        <button type="button" onClick={() => send({ type: "reset" })}>
          Start over
        </button>
      </>
    );
  }

  return (
    <>
      <h2>Sign up</h2>
      <SignupFormView
        form={state.form}
        errors={state.errors}
        onChange={(field, value) => send({ type: "fieldChanged", field, value })}
        onSubmit={() => send({ type: "submitted" })}
      />
    </>
  );
}
