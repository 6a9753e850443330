import { RESOLVE_PAGE_SIZE } from "./library.js";
import type { CatalogClient } from "./library.js";
import { titleSearchUrl } from "./libraries.js";
import type { Notifier } from "./notifier.js";
import type { WatchlistStore } from "./sheet.js";
import { stateKey, statesEqual, toFlag } from "./state.js";
import type { StateStore } from "./state.js";
import type { Logger, WatchEntry } from "./types.js";

export const DEFAULT_DELAY_MS = 500; // Be nice to the API

export interface MonitorDeps {
  catalog: CatalogClient;
  watchlist: WatchlistStore;
  stateStore: StateStore;
  notifier: Notifier;
  logger?: Logger;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface MonitorReport {
  checked: number;
  skipped: number;
  notified: string[];
  stateSaved: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function availabilityMessage(entry: WatchEntry): string {
  return [
    "📚 Available now!",
    "",
    `📖 ${entry.title}`,
    `📍 ${entry.libraryName || "Unknown library"}`,
    "",
    `🔗 Reserve / check details: ${titleSearchUrl(entry.title)}`,
  ].join("\n");
}

async function resolveIsbn(entry: WatchEntry, catalog: CatalogClient): Promise<string | null> {
  if (entry.isbn) return entry.isbn;
  const [first] = await catalog.searchByTitle(entry.title, RESOLVE_PAGE_SIZE);
  return first?.isbn13 || null;
}

/**
 * One pass over the watchlist. A book is announced when its loan flag goes
 * from N to Y; a pair never seen before counts as N, so a book that is
 * already loanable on its first check is announced right away.
 */
export async function runMonitor(deps: MonitorDeps): Promise<MonitorReport> {
  const logger = deps.logger ?? console;
  const delayMs = deps.delayMs ?? DEFAULT_DELAY_MS;
  const wait = deps.sleep ?? sleep;

  const entries = await deps.watchlist.listAll();
  const state = deps.stateStore.load();
  const nextState = { ...state };
  const report: MonitorReport = { checked: 0, skipped: 0, notified: [], stateSaved: false };

  for (const entry of entries) {
    if (!entry.title || !entry.libraryCode) continue;

    logger.info(`Processing: ${entry.title} @ ${entry.libraryName || "?"} (${entry.libraryCode})`);

    const isbn = await resolveIsbn(entry, deps.catalog);
    if (!isbn) {
      logger.warn(`Could not find ISBN for "${entry.title}"`);
      report.skipped += 1;
      continue;
    }

    const availability = await deps.catalog.checkAvailability(entry.libraryCode, isbn);
    await wait(delayMs);
    if (!availability) {
      logger.warn(`Could not check availability for "${entry.title}"`);
      report.skipped += 1;
      continue;
    }

    const key = stateKey({ isbn, libraryCode: entry.libraryCode });
    const lastStatus = state[key] ?? "N";
    const currentStatus = toFlag(availability.loanAvailable);
    logger.info(`Status: ${currentStatus} (last: ${lastStatus})`);

    if (lastStatus === "N" && currentStatus === "Y") {
      await deps.notifier.send(availabilityMessage(entry));
      report.notified.push(entry.title);
    }

    nextState[key] = currentStatus;
    report.checked += 1;
  }

  if (!statesEqual(state, nextState)) {
    deps.stateStore.save(nextState);
    report.stateSaved = true;
    logger.info("State updated.");
  } else {
    logger.info("No changes in state.");
  }

  return report;
}
