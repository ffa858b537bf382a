/**
 * @fileoverview Photo decoders for the gallery exercises
 *
 * The photo list served by the BFF looks like:
 *
 * ```json
 * [
 *   { "url": "1.jpeg", "size": 36, "title": "Beachside" },
 *   { "url": "2.jpeg", "size": 19 }
 * ]
 * ```
 *
 * `title` is optional on the wire. Rather than carry `string | undefined`
 * through every view, the schema fills in a placeholder.
 */

import { z } from "zod";

/** Shown wherever a photo arrives without a title. */
export const UNTITLED = "(untitled)";

/**
 * A single photo as the gallery sees it.
 *
 * @example
 * photoSchema.parse({ url: "fruits.com", size: 5 });
 * // { url: "fruits.com", size: 5, title: "(untitled)" }
 */
export const photoSchema = z.object({
  url: z.string(),
  size: z.number(),
  title: z.string().default(UNTITLED),
});

export const photoListSchema = z.array(photoSchema);

export type Photo = z.infer<typeof photoSchema>;
