import "dotenv/config";
import { loadConfig, parseArgs, resolveSettings, type Settings } from "./config";
import { MissingRequiredFieldError } from "./errors";
import { isRecord, normalizeRecord, toRow, FEATURES } from "./parsers";
import { parseTitles } from "./titles";

interface RawExchange {
  ok: boolean;
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
}

async function req(settings: Settings, path: string): Promise<RawExchange> {
  const u = settings.apiBase.replace(/\/+$/, "") + path;
  const r = await fetch(u, {
    headers: { Accept: "application/json", "User-Agent": settings.userAgent },
    signal: AbortSignal.timeout(settings.timeoutMs),
  });
  const bodyText = await r.text();
  const hdrs: Record<string, string> = {};
  r.headers.forEach((v, k) => (hdrs[k] = v));
  return { ok: r.ok, status: r.status, url: u, headers: hdrs, body: bodyText };
}

function print(title: string, out: RawExchange) {
  const head = {
    status: out.status,
    url: out.url,
    headers: {
      "content-type": out.headers["content-type"],
      "cache-control": out.headers["cache-control"],
      "last-modified": out.headers["last-modified"],
      etag: out.headers["etag"],
    },
  };
  console.log(`\n=== ${title} ===`);
  console.log(JSON.stringify(head, null, 2));
  console.log(out.body.slice(0, 600));
}

function parseBody(out: RawExchange): Record<string, unknown> | undefined {
  if (!out.ok) return undefined;
  try {
    const json: unknown = JSON.parse(out.body);
    return isRecord(json) ? json : undefined;
  } catch (e) {
    console.error(`Body of ${out.url} is not JSON:`, e);
    return undefined;
  }
}

(async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileCfg = await loadConfig(
    typeof args.config === "string" ? args.config : undefined,
  );
  const settings = resolveSettings(args, fileCfg);

  const player = typeof args.player === "string" ? args.player.trim() : "";
  if (!player) {
    console.error("Usage: npm run diagnose -- --player <username> [--title GM]");
    process.exit(1);
  }
  const path = `/player/${encodeURIComponent(player)}`;

  if (typeof args.title === "string") {
    const [title] = parseTitles(args.title);
    const t = await req(settings, `/titled/${title}`);
    print(`titled/${title}`, t);
    const members = parseBody(t)?.players;
    if (Array.isArray(members)) {
      const listed = members.some(
        (m) => typeof m === "string" && m.toLowerCase() === player.toLowerCase(),
      );
      console.log(`${player} ${listed ? "is" : "is NOT"} listed under ${title}`);
    }
  }

  const profile = await req(settings, path);
  print("player/{username}", profile);
  const stats = await req(settings, `${path}/stats`);
  print("player/{username}/stats", stats);

  const p = parseBody(profile);
  const s = parseBody(stats);
  if (!p || !s) {
    console.log("\nThe exporter would skip this player (fetch or decode failure).");
    return;
  }
  try {
    const row = toRow(normalizeRecord(s, p));
    console.log("\n=== normalized ===");
    FEATURES.forEach((f, i) => console.log(`${f.padEnd(20)} ${row[i]}`));
  } catch (e) {
    if (!(e instanceof MissingRequiredFieldError)) throw e;
    console.log(`\nThe exporter would skip this player: ${e.message}`);
  }
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
