/**
 * Where photo files are served from. Photo URLs in the JSON are relative to
 * this; large versions live under `large/`.
 */
export const PHOTO_URL_PREFIX = "/photos/";
