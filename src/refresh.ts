import { missingSettings, readConfig, requireSetting } from "./config.js";
import { createCatalogClient } from "./library.js";
import { runMonitor } from "./monitor.js";
import { createNotifier } from "./notifier.js";
import { createGoogleSheetTable, createWatchlistStore } from "./sheet.js";
import { createStateStore } from "./state.js";
import { createTelegramApi } from "./telegram.js";

// One monitor pass; run it from cron or a scheduled CI job, never two at once
async function main() {
  console.info("Starting library monitor...");
  const config = readConfig();

  const missing = missingSettings(config);
  if (missing.length > 0) {
    console.warn(`Missing settings: ${missing.join(", ")}. Some features may not work.`);
  }

  // Without the sheet there is nothing to watch
  const table = createGoogleSheetTable({
    credentials: requireSetting(config, "GOOGLE_SHEET_CREDENTIALS"),
    sheetUrl: requireSetting(config, "GOOGLE_SHEET_URL"),
    timeoutMs: config.HTTP_TIMEOUT_MS,
  });

  const api = config.TELEGRAM_BOT_TOKEN
    ? createTelegramApi(config.TELEGRAM_BOT_TOKEN, { timeoutMs: config.HTTP_TIMEOUT_MS })
    : null;

  const report = await runMonitor({
    catalog: createCatalogClient({
      apiKey: config.LIBRARY_API_KEY ?? "",
      baseUrl: config.LIBRARY_API_BASE_URL,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    }),
    watchlist: createWatchlistStore(table),
    stateStore: createStateStore(config.STATE_FILE),
    notifier: createNotifier(api, config.TELEGRAM_CHAT_ID),
    delayMs: config.MONITOR_DELAY_MS,
  });

  console.info(
    `Done: ${report.checked} checked, ${report.skipped} skipped, ${report.notified.length} notified` +
      (report.stateSaved ? ", state saved" : "")
  );
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
