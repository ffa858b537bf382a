import { z } from "zod";
import { FILTER_MAX } from "./gallery.js";

const sliderSchema = z.number().int().min(0).max(FILTER_MAX);

/**
 * What the gallery remembers between visits: the thumbnail size and the
 * filter sliders. Photos and the selection are always reloaded.
 */
export const gallerySettingsSchema = z.object({
  chosenSize: z.enum(["small", "medium", "large"]),
  filters: z.object({
    hue: sliderSchema,
    ripple: sliderSchema,
    noise: sliderSchema,
  }),
});

export type GallerySettings = z.infer<typeof gallerySettingsSchema>;
