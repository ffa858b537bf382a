/**
 * @fileoverview Pure helpers behind the photo gallery
 *
 * The gallery grew one chapter at a time: a static list, then clickable
 * selection, a random pick, a size chooser, a server-fetched list, and
 * finally image filters. The view-independent parts of each step live here;
 * the Redux slice in @study-archive/ui wires them to messages.
 *
 * FILTERS:
 * The book drove a canvas image-filter library through JavaScript interop.
 * Here the three sliders map onto a CSS `filter` string instead, which the
 * browser applies natively:
 *
 * | Slider | CSS            | Range           |
 * | ------ | -------------- | --------------- |
 * | hue    | hue-rotate()   | 0deg .. 330deg  |
 * | ripple | blur()         | 0px .. 2px      |
 * | noise  | contrast()     | 100% .. 155%    |
 */

// ============================================================================
// THUMBNAIL SIZES
// ============================================================================

export type ThumbnailSize = "small" | "medium" | "large";

export const THUMBNAIL_SIZES: readonly ThumbnailSize[] = ["small", "medium", "large"];

const THUMBNAIL_WIDTHS: Record<ThumbnailSize, number> = {
  small: 50,
  medium: 100,
  large: 200,
};

export function sizeToWidth(size: ThumbnailSize): number {
  return THUMBNAIL_WIDTHS[size];
}

/** The container class, e.g. `"thumbnails-small"`. */
export function sizeToClassName(size: ThumbnailSize): string {
  return `thumbnails-${size}`;
}

// ============================================================================
// FILTERS
// ============================================================================

export type FilterOptions = {
  hue: number;
  ripple: number;
  noise: number;
};

export type FilterName = keyof FilterOptions;

export const FILTER_MAX = 11;

export const NO_FILTERS: FilterOptions = { hue: 0, ripple: 0, noise: 0 };

/**
 * Clamps a slider reading to a whole number in 0..FILTER_MAX.
 * NaN (an empty input) reads as 0.
 */
export function clampFilterValue(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(FILTER_MAX, Math.max(0, Math.round(value)));
}

/**
 * @example
 * filtersToCss({ hue: 2, ripple: 11, noise: 4 });
 * // "hue-rotate(60deg) blur(2.00px) contrast(120%)"
 * filtersToCss(NO_FILTERS); // "none"
 */
export function filtersToCss(filters: FilterOptions): string {
  const { hue, ripple, noise } = filters;

  if (hue === 0 && ripple === 0 && noise === 0) {
    return "none";
  }

  const blurPx = ((ripple / FILTER_MAX) * 2).toFixed(2);

  return `hue-rotate(${hue * 30}deg) blur(${blurPx}px) contrast(${100 + noise * 5}%)`;
}

/** The activity line shown under the large photo. */
export function describeActivity(filters: FilterOptions): string {
  return `Filters: hue ${filters.hue}, ripple ${filters.ripple}, noise ${filters.noise}`;
}

// ============================================================================
// RANDOM PICK
// ============================================================================

/**
 * Chooses an index for "Surprise Me!".
 *
 * `random` is injectable so reducers and tests stay deterministic; the view
 * passes Math.random.
 *
 * @returns null for an empty list
 */
export function pickRandomIndex(
  length: number,
  random: () => number = Math.random
): number | null {
  if (length <= 0) return null;

  const index = Math.floor(random() * length);
  return Math.min(index, length - 1);
}

/**
 * Joins the server's relative photo URL onto the image host.
 *
 * @example
 * photoSrc("https://photos.example.com/", "1.jpeg"); // "https://photos.example.com/1.jpeg"
 */
export function photoSrc(urlPrefix: string, url: string): string {
  return `${urlPrefix}${url}`;
}
