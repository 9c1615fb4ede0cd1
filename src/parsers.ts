import { MissingRequiredFieldError } from "./errors";

export const STATS_FEATURES = [
  "rapid_rating",
  "rapid_wins",
  "rapid_losses",
  "rapid_draws",
  "blitz_rating",
  "blitz_wins",
  "blitz_losses",
  "blitz_draws",
  "bullet_rating",
  "bullet_wins",
  "bullet_losses",
  "bullet_draws",
  "tactics_rating",
  "puzzle_rush_rating",
] as const;

export const PROFILE_FEATURES = ["country", "location", "title"] as const;

export const FEATURES = [...STATS_FEATURES, ...PROFILE_FEATURES] as const;

export type StatsFeature = (typeof STATS_FEATURES)[number];
export type ProfileFeature = (typeof PROFILE_FEATURES)[number];
export type Feature = (typeof FEATURES)[number];

export type StatsFields = Record<StatsFeature, string>;
export type ProfileFields = Record<ProfileFeature, string>;
export type NormalizedRecord = Record<Feature, string>;

export type RawStatsBundle = Record<string, unknown>;
export type RawProfileBundle = Record<string, unknown>;

export const MISSING_STAT = "0";
export const NO_LOCATION = "No Location Data Available";
export const NO_TITLE = "None";

const COUNTRY_SEGMENT = "/pub/country/";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Walks `path` through nested objects; undefined as soon as a step is not an object.
export function pathValue(source: unknown, path: readonly string[]): unknown {
  let cur: unknown = source;
  for (const key of path) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === "boolean") return String(value);
  return undefined;
}

function stat(stats: RawStatsBundle, ...path: string[]): string {
  return scalarText(pathValue(stats, path)) ?? MISSING_STAT;
}

/**
 * Flattens a /player/{username}/stats payload into the 14 stats columns.
 *
 * Every column is looked up on its own, so a player with a `best` rating but
 * no `record` still gets the rating. `puzzle_rush.best.score` is the best
 * score across all puzzle rush modes; the API does not say which one.
 */
export function normalizeStats(stats: RawStatsBundle): StatsFields {
  return {
    rapid_rating: stat(stats, "chess_rapid", "best", "rating"),
    rapid_wins: stat(stats, "chess_rapid", "record", "win"),
    rapid_losses: stat(stats, "chess_rapid", "record", "loss"),
    rapid_draws: stat(stats, "chess_rapid", "record", "draw"),
    blitz_rating: stat(stats, "chess_blitz", "best", "rating"),
    blitz_wins: stat(stats, "chess_blitz", "record", "win"),
    blitz_losses: stat(stats, "chess_blitz", "record", "loss"),
    blitz_draws: stat(stats, "chess_blitz", "record", "draw"),
    bullet_rating: stat(stats, "chess_bullet", "best", "rating"),
    bullet_wins: stat(stats, "chess_bullet", "record", "win"),
    bullet_losses: stat(stats, "chess_bullet", "record", "loss"),
    bullet_draws: stat(stats, "chess_bullet", "record", "draw"),
    tactics_rating: stat(stats, "tactics", "highest", "rating"),
    puzzle_rush_rating: stat(stats, "puzzle_rush", "best", "score"),
  };
}

// "https://api.chess.com/pub/country/US" → "US"; a bare code passes through.
export function extractCountryCode(ref: string): string {
  const at = ref.lastIndexOf(COUNTRY_SEGMENT);
  return at >= 0 ? ref.slice(at + COUNTRY_SEGMENT.length) : ref;
}

/**
 * Pulls country, location and title from a /player/{username} payload.
 * Location is free text typed by the player and may be nonsense.
 *
 * @throws MissingRequiredFieldError when `country` is absent
 */
export function normalizeProfile(profile: RawProfileBundle): ProfileFields {
  const country = profile.country;
  if (typeof country !== "string") {
    throw new MissingRequiredFieldError("country");
  }
  const location = profile.location;
  const title = profile.title;
  return {
    country: extractCountryCode(country),
    location: typeof location === "string" ? location : NO_LOCATION,
    title: typeof title === "string" ? title : NO_TITLE,
  };
}

export function normalizeRecord(
  stats: RawStatsBundle,
  profile: RawProfileBundle,
): NormalizedRecord {
  return { ...normalizeStats(stats), ...normalizeProfile(profile) };
}

export function toRow(record: NormalizedRecord): string[] {
  return FEATURES.map((f) => record[f]);
}
