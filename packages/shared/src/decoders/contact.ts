/**
 * @fileoverview Nullable, optional and partial decoding
 *
 * Three ways a field can be "not really there":
 *
 * | JSON                       | Schema                  | TypeScript            |
 * | -------------------------- | ----------------------- | --------------------- |
 * | `"email": null`            | `z.string().nullable()` | `string \| null`      |
 * | key missing                | `z.string().optional()` | `string \| undefined` |
 * | extra keys we don't model  | `decodePartial`         | `Record<string, unknown>` |
 *
 * Nullable means the server promises the key and may send null. Optional
 * means the key itself may be absent. Mixing them up is the classic bug:
 * `z.string().nullable()` rejects a missing key.
 */

import { z } from "zod";
import { formatDecodeError, type DecodeResult } from "./decode.js";

/**
 * An address-book entry.
 *
 * @example
 * contactSchema.parse({ name: "Ada", email: null });
 * // { name: "Ada", email: null }
 */
export const contactSchema = z.object({
  name: z.string().min(1),
  email: z.string().nullable(),
  nickname: z.string().optional(),
});

export type Contact = z.infer<typeof contactSchema>;

/**
 * Result of a partial decode: the modelled fields, plus everything else
 * left untyped.
 */
export type PartialDecode<T> = {
  known: T;
  rest: Record<string, unknown>;
};

/**
 * Decodes the fields an object schema knows about and keeps the remainder
 * as untyped JSON.
 *
 * Useful when exploring an API whose full shape isn't known yet: the fields
 * we rely on are checked, the rest stays around for inspection.
 *
 * @example
 * decodePartial(contactSchema, { name: "Ada", email: null, team: "blue" });
 * // { ok: true, data: { known: { name: "Ada", email: null }, rest: { team: "blue" } } }
 */
export function decodePartial<S extends z.AnyZodObject>(
  schema: S,
  value: unknown
): DecodeResult<PartialDecode<z.output<S>>> {
  const parsed = schema.safeParse(value);

  if (!parsed.success) {
    return { ok: false, error: formatDecodeError(parsed.error) };
  }

  const knownKeys = new Set(Object.keys(schema.shape));
  const rest: Record<string, unknown> = {};

  // safeParse only succeeds on objects, so this walks the original input
  if (typeof value === "object" && value !== null) {
    for (const [key, field] of Object.entries(value)) {
      if (!knownKeys.has(key)) {
        rest[key] = field;
      }
    }
  }

  return { ok: true, data: { known: parsed.data, rest } };
}
