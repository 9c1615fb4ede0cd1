import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { PlayerDataSource } from "./chess-helpers";
import {
  buildTitleDataset,
  datasetFileName,
  datasetToCsv,
  type SkippedPlayer,
} from "./dataset";
import type { FetchFailure } from "./errors";
import { TITLE_CATEGORIES, type TitleCategory } from "./titles";

export interface ExportOptions {
  source: PlayerDataSource;
  outDir: string;
  cleanOut?: boolean;
  debug?: boolean;
}

export type TitleSummary =
  | {
      title: TitleCategory;
      ok: true;
      file: string;
      recorded: number;
      skipped: SkippedPlayer[];
      seconds: number;
    }
  | {
      title: TitleCategory;
      ok: false;
      error: FetchFailure;
      seconds: number;
    };

const elapsed = (t0: number) => (Date.now() - t0) / 1000;

/**
 * Writes `chess_data_<TITLE>.csv` into `outDir` for every title, in order.
 * A title whose member list cannot be fetched gets no file; the rest still run.
 */
export async function exportTitledPlayers(
  titles: readonly TitleCategory[] = TITLE_CATEGORIES,
  opts: ExportOptions,
): Promise<TitleSummary[]> {
  const { source, outDir, debug = false } = opts;
  if (opts.cleanOut) {
    await rm(outDir, { recursive: true, force: true });
  }
  await mkdir(outDir, { recursive: true });

  const summaries: TitleSummary[] = [];
  for (const title of titles) {
    console.log(`[${title}] Fetching member list...`);
    const t0 = Date.now();

    const built = await buildTitleDataset(title, source, {
      onPlayer: debug
        ? (player, i, total) =>
            console.log(`[${title}] ${i + 1}/${total} ${player}`)
        : undefined,
    });
    if (!built.ok) {
      console.error(`[${title}] Member list failed: ${built.error.message}`);
      summaries.push({
        title,
        ok: false,
        error: built.error,
        seconds: elapsed(t0),
      });
      continue;
    }

    const { dataset, skipped } = built.value;
    for (const s of skipped) {
      console.warn(`[${title}] skipped ${s.player}: ${s.error.message}`);
      if (debug) {
        console.error(
          "DEBUG raw bundles:",
          JSON.stringify({ stats: s.stats, profile: s.profile }, null, 2),
        );
      }
    }

    const file = path.join(outDir, datasetFileName(title));
    await writeFile(file, datasetToCsv(dataset), "utf8");
    summaries.push({
      title,
      ok: true,
      file,
      recorded: dataset.size,
      skipped,
      seconds: elapsed(t0),
    });
  }
  return summaries;
}

export function formatSummary(s: TitleSummary): string {
  if (!s.ok) {
    return `${s.title}: failed (${s.error.message}) in ${s.seconds.toFixed(1)}s`;
  }
  return `${s.title}: recorded ${s.recorded}, skipped ${s.skipped.length} in ${s.seconds.toFixed(1)}s -> ${s.file}`;
}
