import { healthPort, missingSettings, readConfig, requireSetting } from "./config.js";
import { startHealthServer } from "./health.js";
import { createCatalogClient } from "./library.js";
import { runPolling } from "./polling.js";
import { connectWatchlist } from "./sheet.js";
import { createTelegramApi } from "./telegram.js";

async function main() {
  console.info("Starting Telegram bot...");
  const config = readConfig();

  // Bring the liveness responder up first so the platform sees the service early
  const port = healthPort(config);
  const healthServer = port === null ? null : startHealthServer(port);

  const missing = missingSettings(config);
  if (missing.length > 0) {
    console.warn(`Missing settings: ${missing.join(", ")}. Some features may not work.`);
  }

  const api = createTelegramApi(requireSetting(config, "TELEGRAM_BOT_TOKEN"), {
    timeoutMs: config.HTTP_TIMEOUT_MS,
  });
  const deps = {
    catalog: createCatalogClient({
      apiKey: config.LIBRARY_API_KEY ?? "",
      baseUrl: config.LIBRARY_API_BASE_URL,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    }),
    watchlist: connectWatchlist(config),
  };

  const controller = new AbortController();

  function shutdown() {
    console.info("Shutting down...");
    controller.abort();
    healthServer?.close();
  }

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  console.info("Running in polling mode");
  await runPolling(api, deps, { signal: controller.signal });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
