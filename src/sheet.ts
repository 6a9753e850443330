import { google } from "googleapis";
import type { Config } from "./config.js";
import { requireSetting } from "./config.js";
import { parseServiceAccount } from "./credentials.js";
import { describeError } from "./errors.js";
import type { Logger, WatchEntry } from "./types.js";

export const SHEET_HEADER = ["Title", "LibraryCode", "LibraryName", "ISBN"] as const;

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

/** Raw cell access to one worksheet. Row 0 is the header row. */
export interface SheetTable {
  readRows(): Promise<string[][]>;
  appendRow(values: string[]): Promise<void>;
  deleteRow(rowIndex: number): Promise<void>;
}

export interface WatchlistStore {
  listAll(): Promise<WatchEntry[]>;
  append(entry: WatchEntry): Promise<boolean>;
  deleteByTitle(title: string): Promise<boolean>;
}

export function parseSpreadsheetId(urlOrId: string): string {
  const match = urlOrId.match(/\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/);
  return match ? match[1] : urlOrId.trim();
}

export function createGoogleSheetTable(options: {
  credentials: string;
  sheetUrl: string;
  timeoutMs?: number;
}): SheetTable {
  const account = parseServiceAccount(options.credentials);
  const auth = new google.auth.JWT({
    email: account.client_email,
    key: account.private_key,
    scopes: SCOPES,
  });
  const sheets = google.sheets({ version: "v4", auth, timeout: options.timeoutMs ?? 10_000 });
  const spreadsheetId = parseSpreadsheetId(options.sheetUrl);

  let firstSheet: { sheetId: number; range: string } | undefined;

  // The watchlist lives on the first worksheet, whatever it is called
  async function worksheet(): Promise<{ sheetId: number; range: string }> {
    if (firstSheet) return firstSheet;
    const res = await sheets.spreadsheets.get({
      spreadsheetId,
      fields: "sheets.properties(sheetId,title)",
    });
    const properties = res.data.sheets?.[0]?.properties;
    const sheetId = properties?.sheetId;
    const title = properties?.title;
    if (sheetId == null || !title) {
      throw new Error(`Spreadsheet ${spreadsheetId} has no worksheet`);
    }
    firstSheet = { sheetId, range: `'${title.replace(/'/g, "''")}'` };
    return firstSheet;
  }

  return {
    async readRows() {
      const { range } = await worksheet();
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      return (res.data.values ?? []).map((row) => row.map((cell) => (cell == null ? "" : String(cell))));
    },

    async appendRow(values) {
      const { range } = await worksheet();
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [values] },
      });
    },

    async deleteRow(rowIndex) {
      const { sheetId } = await worksheet();
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [
            {
              deleteDimension: {
                range: { sheetId, dimension: "ROWS", startIndex: rowIndex, endIndex: rowIndex + 1 },
              },
            },
          ],
        },
      });
    },
  };
}

// One record per data row, in sheet order, so record i is sheet row i + 1
function toEntries(rows: string[][]): WatchEntry[] {
  const [header, ...data] = rows;
  if (!header) return [];
  const columns = SHEET_HEADER.map((name) => header.findIndex((cell) => cell.trim() === name));
  const [titleCol, codeCol, nameCol, isbnCol] = columns;
  if (titleCol < 0) return [];

  const cell = (row: string[], col: number): string => (col >= 0 ? (row[col] ?? "").trim() : "");

  return data.map((row) => {
    const isbn = cell(row, isbnCol);
    return {
      title: cell(row, titleCol),
      libraryCode: cell(row, codeCol),
      libraryName: cell(row, nameCol),
      ...(isbn ? { isbn } : {}),
    };
  });
}

export function createWatchlistStore(table: SheetTable, logger: Logger = console): WatchlistStore {
  return {
    async listAll() {
      try {
        return toEntries(await table.readRows());
      } catch (error) {
        logger.error(`Error reading watchlist: ${describeError(error)}`);
        return [];
      }
    },

    async append(entry) {
      try {
        await table.appendRow([entry.title, entry.libraryCode, entry.libraryName, entry.isbn ?? ""]);
        return true;
      } catch (error) {
        logger.error(`Error adding "${entry.title}" to watchlist: ${describeError(error)}`);
        return false;
      }
    },

    async deleteByTitle(title) {
      const wanted = title.trim().toLowerCase();
      try {
        const entries = toEntries(await table.readRows());
        const index = entries.findIndex((entry) => entry.title.toLowerCase() === wanted);
        if (index < 0) return false;
        await table.deleteRow(index + 1);
        return true;
      } catch (error) {
        logger.error(`Error deleting "${title}" from watchlist: ${describeError(error)}`);
        return false;
      }
    },
  };
}

export function createDisconnectedWatchlist(reason: string, logger: Logger = console): WatchlistStore {
  const refuse = (operation: string) => logger.warn(`Watchlist ${operation} skipped: ${reason}`);
  return {
    async listAll() {
      refuse("read");
      return [];
    },
    async append() {
      refuse("append");
      return false;
    },
    async deleteByTitle() {
      refuse("delete");
      return false;
    },
  };
}

/** Sheet-backed watchlist, or a disconnected one when the sheet settings are unusable. */
export function connectWatchlist(config: Config, logger: Logger = console): WatchlistStore {
  try {
    const table = createGoogleSheetTable({
      credentials: requireSetting(config, "GOOGLE_SHEET_CREDENTIALS"),
      sheetUrl: requireSetting(config, "GOOGLE_SHEET_URL"),
      timeoutMs: config.HTTP_TIMEOUT_MS,
    });
    logger.info("Connected to Google Sheets");
    return createWatchlistStore(table, logger);
  } catch (error) {
    logger.error(`Failed to connect to Google Sheet: ${describeError(error)}`);
    return createDisconnectedWatchlist(describeError(error), logger);
  }
}
