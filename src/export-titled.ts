import "dotenv/config";
import { createChessSource } from "./chess-helpers";
import { loadConfig, parseArgs, resolveSettings } from "./config";
import { exportTitledPlayers, formatSummary } from "./exporter";

(async () => {
  const args = parseArgs(process.argv.slice(2));
  const fileCfg = await loadConfig(
    typeof args.config === "string" ? args.config : undefined,
  );
  const settings = resolveSettings(args, fileCfg);

  if (settings.debug) {
    console.error("DEBUG settings:", JSON.stringify(settings, null, 2));
  }

  const source = createChessSource({
    apiBase: settings.apiBase,
    timeoutMs: settings.timeoutMs,
    userAgent: settings.userAgent,
  });

  const summaries = await exportTitledPlayers(settings.titles, {
    source,
    outDir: settings.outDir,
    cleanOut: settings.cleanOut,
    debug: settings.debug,
  });

  console.log(`Done.\n  ${summaries.map(formatSummary).join("\n  ")}`);
  if (summaries.some((s) => !s.ok)) process.exitCode = 1;
})().catch((e) => {
  console.error(e);
  process.exit(1);
});
