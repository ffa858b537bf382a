/**
 * @fileoverview Utility exports for the shared package
 *
 * - sleep: backoff delay
 * - http: retry rule and timeout controller
 * - bootstrap: payload factories and validators
 */

export * from "./sleep.js";
export * from "./http.js";
export * from "./bootstrap.js";
