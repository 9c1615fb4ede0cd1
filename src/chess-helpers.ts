import {
  DecodeFailure,
  TransportFailure,
  fail,
  ok,
  type FetchResult,
} from "./errors";
import { isRecord, type RawProfileBundle, type RawStatsBundle } from "./parsers";
import type { TitleCategory } from "./titles";

export const DEFAULT_API_BASE = "https://api.chess.com/pub";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "titled-stats-export/1.0";

export interface PlayerDataSource {
  listMembers(title: TitleCategory): Promise<FetchResult<string[]>>;
  fetchStats(player: string): Promise<FetchResult<RawStatsBundle>>;
  fetchProfile(player: string): Promise<FetchResult<RawProfileBundle>>;
}

export interface ChessSourceOptions {
  apiBase?: string;
  timeoutMs?: number;
  userAgent?: string;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// One GET, no retry. Anything short of a decoded JSON object is a failure.
async function j(
  u: string,
  timeoutMs: number,
  headers: Record<string, string>,
): Promise<FetchResult<Record<string, unknown>>> {
  let r: Response;
  try {
    r = await fetch(u, { headers, signal: AbortSignal.timeout(timeoutMs) });
  } catch (e) {
    const timedOut = e instanceof Error && e.name === "TimeoutError";
    return fail(
      new TransportFailure(
        timedOut ? `Timed out after ${timeoutMs}ms: ${u}` : `${messageOf(e)} ${u}`,
        u,
        undefined,
        { cause: e },
      ),
    );
  }
  if (!r.ok) {
    return fail(new TransportFailure(`${r.status} ${u}`, u, r.status));
  }
  let body: string;
  try {
    body = await r.text();
  } catch (e) {
    return fail(
      new TransportFailure(`${messageOf(e)} ${u}`, u, r.status, { cause: e }),
    );
  }
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    return fail(
      new DecodeFailure(`Invalid JSON from ${u}: ${messageOf(e)}`, u, {
        cause: e,
      }),
    );
  }
  if (!isRecord(data)) {
    return fail(new DecodeFailure(`Expected a JSON object from ${u}`, u));
  }
  return ok(data);
}

export function createChessSource(
  options: ChessSourceOptions = {},
): PlayerDataSource {
  const base = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const H = {
    Accept: "application/json",
    "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
  };
  const playerUrl = (player: string) =>
    `${base}/player/${encodeURIComponent(player)}`;

  return {
    // Title → usernames, in the order the API lists them
    async listMembers(title) {
      const u = `${base}/titled/${encodeURIComponent(title)}`;
      const res = await j(u, timeoutMs, H);
      if (!res.ok) return res;
      const players = res.value.players;
      if (
        !Array.isArray(players) ||
        !players.every((p): p is string => typeof p === "string")
      ) {
        return fail(
          new DecodeFailure(`Expected a players string array from ${u}`, u),
        );
      }
      return ok(players);
    },

    async fetchStats(player) {
      return j(`${playerUrl(player)}/stats`, timeoutMs, H);
    },

    async fetchProfile(player) {
      return j(playerUrl(player), timeoutMs, H);
    },
  };
}
