/**
 * @fileoverview Main entry point for the @study-archive/shared package
 *
 * Everything in here is plain TypeScript with no DOM or Node dependencies,
 * so the BFF, the browser and the tests can all import it.
 *
 * WHAT'S INCLUDED:
 *
 * TYPES (./types):
 * - BootstrapPayload, Todo
 *
 * EXERCISES:
 * - adder: gate-level 4-bit ripple-carry adder
 * - decoders: zod schemas and DecodeResult helpers
 * - gallery: thumbnail sizes, filters, random pick
 * - folders: recursive folder tree over a flat photo table
 * - forms: signup validation and its reducer
 * - todos: the local to-do list reducer
 * - ports: typed localStorage ports
 * - notes: mutation vs. immutability scratchpad
 *
 * UTILITIES (./utils):
 * - sleep, isRetryableError, createTimeoutController
 * - bootstrap payload factories and validators
 *
 * @example
 * import { decodeString, photoSchema } from "@study-archive/shared";
 */

export * from "./types/index.js";
export * from "./utils/index.js";
export * from "./adder/index.js";
export * from "./decoders/index.js";
export * from "./gallery/index.js";
export * from "./folders/index.js";
export * from "./forms/index.js";
export * from "./todos/index.js";
export * from "./ports/index.js";
export * from "./notes/index.js";
