// Filename: constants/Provenance.ts

/**
 * --- PROVENANCE ---
 * Which tier produced a served record.
 */
export const ALL_PROVENANCES = [
  "FRESH", // Live fetch just now
  "SHORT_TERM", // Short-lived volatile tier
  "LONG_TERM", // Long-lived volatile tier
  "STATIC_FALLBACK", // Bundled CSV files
] as const;

export type Provenance = (typeof ALL_PROVENANCES)[number];

/** Value of the `cached` response field. */
export type CachedFlag = false | "short_term" | "fallback" | "csv_fallback";

export const CACHED_FLAGS: Readonly<Record<Provenance, CachedFlag>> = Object.freeze({
  FRESH: false,
  SHORT_TERM: "short_term",
  LONG_TERM: "fallback",
  STATIC_FALLBACK: "csv_fallback",
});

export function toCachedFlag(provenance: Provenance): CachedFlag {
  return CACHED_FLAGS[provenance];
}
