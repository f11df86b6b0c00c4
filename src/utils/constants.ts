export const PLAN_CONSTANTS = {
  MIN_QUERY_LENGTH: 5,
  MAX_QUERY_LENGTH: 500,
  MIN_WEEKS: 1,
  MAX_WEEKS: 52,
  // running_plan.motivation is cut to this many characters in plan listings
  SUMMARY_MOTIVATION_LENGTH: 50,
  SCHEMA_NAME: "running_plan",
} as const;

export const IMAGE_MIME_TYPES = {
  jpeg: "image/jpeg",
  jpg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  tiff: "image/tiff",
  avif: "image/avif",
  heif: "image/heif",
} as const;

export type RasterFormat = keyof typeof IMAGE_MIME_TYPES;

export const DEFAULT_IMAGE_MIME_TYPE = IMAGE_MIME_TYPES.jpeg;
