import { stringify } from "csv-stringify/sync";
import type { PlayerDataSource } from "./chess-helpers";
import { fail, isFetchFailure, ok, type FetchFailure, type FetchResult } from "./errors";
import { FEATURES, normalizeRecord, type NormalizedRecord } from "./parsers";
import type { TitleCategory } from "./titles";

export const ID_COLUMN = "player_name";

export type Dataset = Map<string, NormalizedRecord>;

export interface SkippedPlayer {
  player: string;
  error: FetchFailure;
  stats?: unknown;
  profile?: unknown;
}

export interface TitleDataset {
  title: TitleCategory;
  dataset: Dataset;
  skipped: SkippedPlayer[];
}

export interface BuildOptions {
  onPlayer?: (player: string, index: number, total: number) => void;
}

// First occurrence wins; usernames compare case-insensitively.
export function uniquePlayers(players: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of players) {
    const key = p.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(p);
  }
  return out;
}

/**
 * Lists the members of `title` and records one row per player, in list order.
 *
 * A failing membership call fails the whole title. A player whose stats or
 * profile cannot be fetched, or whose profile has no country, is left out and
 * reported in `skipped`.
 */
export async function buildTitleDataset(
  title: TitleCategory,
  source: PlayerDataSource,
  opts: BuildOptions = {},
): Promise<FetchResult<TitleDataset>> {
  const members = await source.listMembers(title);
  if (!members.ok) return fail(members.error);

  const players = uniquePlayers(members.value);
  const dataset: Dataset = new Map();
  const skipped: SkippedPlayer[] = [];

  for (const [i, player] of players.entries()) {
    opts.onPlayer?.(player, i, players.length);

    const stats = await source.fetchStats(player);
    if (!stats.ok) {
      skipped.push({ player, error: stats.error });
      continue;
    }
    const profile = await source.fetchProfile(player);
    if (!profile.ok) {
      skipped.push({ player, error: profile.error, stats: stats.value });
      continue;
    }

    try {
      dataset.set(player, normalizeRecord(stats.value, profile.value));
    } catch (e) {
      if (!isFetchFailure(e)) throw e;
      skipped.push({
        player,
        error: e,
        stats: stats.value,
        profile: profile.value,
      });
    }
  }

  return ok({ title, dataset, skipped });
}

export function datasetToCsv(dataset: Dataset): string {
  return stringify(
    [...dataset].map(([player, record]) => ({ [ID_COLUMN]: player, ...record })),
    { header: true, columns: [ID_COLUMN, ...FEATURES] },
  );
}

export function datasetFileName(title: TitleCategory): string {
  return `chess_data_${title}.csv`;
}
