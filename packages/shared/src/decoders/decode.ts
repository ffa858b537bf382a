/**
 * @fileoverview Running zod schemas over untyped JSON
 *
 * WHAT IS A DECODER?
 * JSON arriving from a server or from localStorage is `unknown` until we
 * check it. A decoder checks the shape and hands back a typed value, or
 * says exactly which field was wrong:
 *
 *   unknown  ──decode──▶  { ok: true, data: Photo }
 *                    └──▶  { ok: false, error: "size: Expected number, received string" }
 *
 * KEY CONCEPTS:
 *
 * 1. SCHEMAS ARE VALUES - A zod schema describes a shape once and gives us
 *    both the runtime check and the static type (`z.infer`).
 *
 * 2. FAILURES ARE VALUES - A DecodeResult is a discriminated union on
 *    `ok`. Nothing here throws.
 */

import type { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Outcome of decoding a value.
 *
 * @example
 * const result = decodeValue(photoSchema, raw);
 * if (!result.ok) {
 *   console.warn(result.error);
 *   return;
 * }
 * result.data.url; // string
 */
export type DecodeResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Flattens a zod error into one line per issue.
 *
 * Each issue reads `<path>: <message>`, with dotted paths (`photos.0.size`)
 * and `(root)` when the top-level value itself is wrong.
 *
 * @example
 * formatDecodeError(err);
 * // "size: Expected number, received string; url: Required"
 */
export function formatDecodeError(
  error: z.ZodError,
  parentPath: ReadonlyArray<string | number> = []
): string {
  return error.issues
    .map((issue) => {
      const fullPath = [...parentPath, ...issue.path];
      const path = fullPath.length > 0 ? fullPath.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * Decodes an already-parsed value.
 */
export function decodeValue<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown
): DecodeResult<z.output<S>> {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    return { ok: false, error: formatDecodeError(parsed.error) };
  }

  return { ok: true, data: parsed.data };
}

/**
 * Parses a JSON string and decodes the result.
 *
 * Parse failures and shape failures both come back as `ok: false`, so
 * callers only handle one kind of error.
 *
 * @example
 * decodeString(photoSchema, '{"url": "fruits.com", "size": 5}');
 * // { ok: true, data: { url: "fruits.com", size: 5, title: "(untitled)" } }
 */
export function decodeString<S extends z.ZodTypeAny>(
  schema: S,
  json: string
): DecodeResult<z.output<S>> {
  let raw: unknown;

  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  return decodeValue(schema, raw);
}

/**
 * Decodes a single named field of an object and ignores the rest.
 *
 * Errors are prefixed with the field name so they read the same as a
 * full-object decode would.
 *
 * @example
 * decodeField({ url: "a.jpg", size: "big" }, "url", z.string());
 * // { ok: true, data: "a.jpg" }
 */
export function decodeField<S extends z.ZodTypeAny>(
  value: unknown,
  key: string,
  schema: S
): DecodeResult<z.output<S>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, error: "(root): Expected object" };
  }

  if (!(key in value)) {
    return { ok: false, error: `${key}: Required` };
  }

  const field: unknown = Reflect.get(value, key);
  const parsed = schema.safeParse(field);

  if (!parsed.success) {
    return { ok: false, error: formatDecodeError(parsed.error, [key]) };
  }

  return { ok: true, data: parsed.data };
}
