import { readFile } from "node:fs/promises";
import {
  DEFAULT_API_BASE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from "./chess-helpers";
import { isRecord } from "./parsers";
import { TITLE_CATEGORIES, parseTitles, type TitleCategory } from "./titles";

export const DEFAULT_CONFIG_PATH = "chess.config.json";

export type CliArgs = Record<string, string | boolean>;
export type FileConfig = Record<string, unknown>;

export interface Settings {
  outDir: string;
  titles: TitleCategory[];
  apiBase: string;
  timeoutMs: number;
  userAgent: string;
  debug: boolean;
  cleanOut: boolean;
}

// --key value pairs; a --key followed by another flag (or nothing) is `true`
export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
    } else {
      out[key] = next;
      i++;
    }
  }
  return out;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export async function loadConfig(path?: string): Promise<FileConfig> {
  const candidate = path ?? DEFAULT_CONFIG_PATH;
  let raw: string;
  try {
    raw = await readFile(candidate, "utf8");
  } catch (e) {
    if (isMissingFile(e)) return {};
    throw e;
  }
  const json: unknown = JSON.parse(raw);
  if (!isRecord(json)) {
    throw new Error(`${candidate} must contain a JSON object`);
  }
  return json;
}

function text(v: unknown): string | undefined {
  if (typeof v === "string" && v.trim()) return v.trim();
  if (typeof v === "number") return String(v);
  return undefined;
}

function flag(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "string" && v.trim()) {
    return ["1", "true", "yes"].includes(v.trim().toLowerCase());
  }
  return undefined;
}

function titleList(v: unknown): TitleCategory[] | undefined {
  if (Array.isArray(v)) {
    return parseTitles(v.map((x) => String(x)));
  }
  const s = text(v);
  return s ? parseTitles(s) : undefined;
}

function positiveInt(name: string, v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${v}"`);
  }
  return n;
}

/** CLI flag, then config file, then CHESS_* environment variable, then default. */
export function resolveSettings(
  args: CliArgs,
  fileCfg: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const pick = (key: string, envKey: string): unknown =>
    args[key] ?? fileCfg[key] ?? env[envKey];

  const timeout = text(pick("timeout-ms", "CHESS_TIMEOUT_MS"));

  return {
    outDir: text(pick("out-dir", "CHESS_OUT_DIR")) ?? "out",
    titles: titleList(pick("titles", "CHESS_TITLES")) ?? [...TITLE_CATEGORIES],
    apiBase: text(pick("api-base", "CHESS_API_BASE")) ?? DEFAULT_API_BASE,
    timeoutMs: timeout
      ? positiveInt("timeout-ms", timeout)
      : DEFAULT_TIMEOUT_MS,
    userAgent: text(pick("user-agent", "CHESS_USER_AGENT")) ?? DEFAULT_USER_AGENT,
    debug: flag(pick("debug", "CHESS_DEBUG")) ?? false,
    cleanOut: flag(pick("clean-out", "CHESS_CLEAN_OUT")) ?? false,
  };
}
