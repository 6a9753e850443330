import { describeError } from "./errors.js";
import { INTERACTIVE_PAGE_SIZE } from "./library.js";
import type { CatalogClient } from "./library.js";
import { BUCHEON_LIBRARIES, DEFAULT_LIBRARY, isbnSearchUrl } from "./libraries.js";
import type { WatchlistStore } from "./sheet.js";
import type { BookDoc, Library, Logger } from "./types.js";

export const DATA_CAVEAT = "⚠️ Catalog data is as of the previous day, not real time.";

export const HELP_TEXT = [
  "📚 Bucheon library bot",
  "",
  "/s <title or ISBN> - loan availability at every library",
  "/st - current status of the watchlist",
  "/l - show the watchlist",
  "/a <title> - add a book to the watchlist",
  "/d <title> - remove a book from the watchlist",
  "/h - show this help",
  "",
  "Any other text is searched as a title.",
  "",
  "⏰ The watchlist is checked periodically; you get a message when a book becomes loanable.",
  DATA_CAVEAT,
].join("\n");

export type Route =
  | { kind: "help" }
  | { kind: "search"; query: string }
  | { kind: "status" }
  | { kind: "list" }
  | { kind: "add"; title: string }
  | { kind: "delete"; title: string }
  | { kind: "isbn"; isbn: string | null }
  | { kind: "ignore" };

const COMMANDS: Record<string, "help" | "search" | "status" | "list" | "add" | "delete"> = {
  h: "help",
  help: "help",
  start: "help",
  s: "search",
  search: "search",
  st: "status",
  status: "status",
  l: "list",
  list: "list",
  a: "add",
  add: "add",
  d: "delete",
  delete: "delete",
};

/** 13 digits once dashes are removed, or null for anything that should be searched as a title. */
export function isbnFromQuery(query: string): string | null {
  const digits = query.trim().replace(/-/g, "");
  return /^\d{13}$/.test(digits) ? digits : null;
}

export function routeMessage(text: string): Route {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return { kind: "ignore" };

  const [first, ...rest] = words;
  const args = rest.join(" ");
  if (!first.startsWith("/")) return { kind: "search", query: words.join(" ") };

  // "/s@SomeBot" is how group chats address a command
  const command = first.slice(1).split("@")[0].toLowerCase();
  if (command.startsWith("isbn")) {
    const isbn = command.slice(4);
    return { kind: "isbn", isbn: rest.length === 0 && /^\d{13}$/.test(isbn) ? isbn : null };
  }

  const kind = COMMANDS[command];
  switch (kind) {
    case "search":
      return { kind, query: args };
    case "add":
    case "delete":
      return { kind, title: args };
    case "help":
    case "status":
    case "list":
      return { kind };
    default:
      return { kind: "ignore" };
  }
}

export interface SentMessage {
  edit(text: string): Promise<void>;
}

/** The chat a command came from. */
export interface Conversation {
  reply(text: string): Promise<SentMessage>;
}

export interface BotDeps {
  catalog: CatalogClient;
  watchlist: WatchlistStore;
  logger?: Logger;
  libraries?: Library[];
  defaultLibrary?: Library;
}

export interface FanOut {
  available: Library[];
  onLoan: Library[];
  notHeld: Library[];
  unknown: Library[];
}

export async function checkAllLibraries(
  catalog: CatalogClient,
  isbn: string,
  libraries: Library[] = BUCHEON_LIBRARIES
): Promise<FanOut> {
  const fanOut: FanOut = { available: [], onLoan: [], notHeld: [], unknown: [] };
  for (const library of libraries) {
    const result = await catalog.checkAvailability(library.code, isbn);
    if (!result) fanOut.unknown.push(library);
    else if (!result.hasBook) fanOut.notHeld.push(library);
    else if (result.loanAvailable) fanOut.available.push(library);
    else fanOut.onLoan.push(library);
  }
  return fanOut;
}

export function formatAvailability(book: { isbn: string; title: string; author?: string }, fanOut: FanOut): string {
  const lines = [`📖 ${book.title}`];
  if (book.author) lines.push(`👤 ${book.author}`);
  lines.push(`🔢 ISBN: ${book.isbn}`);

  if (fanOut.available.length > 0) {
    lines.push("", "✅ Available:", ...fanOut.available.map((library) => `  • ${library.name}`));
  }
  if (fanOut.onLoan.length > 0) {
    lines.push("", "❌ On loan:", ...fanOut.onLoan.map((library) => `  • ${library.name}`));
  }
  if (fanOut.available.length === 0 && fanOut.onLoan.length === 0) {
    if (fanOut.notHeld.length === 0) lines.push("", "❓ Availability could not be checked");
    else if (fanOut.unknown.length === 0) lines.push("", "📭 Not held by any Bucheon library");
    else lines.push("", "📭 Not held by any library that answered");
  }
  if (fanOut.unknown.length > 0 && (fanOut.available.length > 0 || fanOut.onLoan.length > 0 || fanOut.notHeld.length > 0)) {
    lines.push("", `❓ Could not check: ${fanOut.unknown.map((library) => library.name).join(", ")}`);
  }

  lines.push("", `🔗 Check live: ${isbnSearchUrl(book.isbn)}`, DATA_CAVEAT);
  return lines.join("\n");
}

export function quickPick(isbn: string): string | null {
  return /^\d{13}$/.test(isbn) ? `/isbn${isbn}` : null;
}

export function formatSearchResults(query: string, books: BookDoc[]): string {
  const entries = books.slice(0, INTERACTIVE_PAGE_SIZE).map((book, i) => {
    const lines = [`${i + 1}. ${(book.bookname || "(untitled)").slice(0, 40)}`];
    if (book.authors) lines.push(`   👤 ${book.authors.slice(0, 20)}`);
    lines.push(`   ${quickPick(book.isbn13) ?? "(no ISBN)"}`);
    return lines.join("\n");
  });
  return [`📚 Results for '${query}' (${books.length})`, ...entries, "👆 Tap the /isbn... of the book you want"].join("\n\n");
}

async function showAvailability(
  target: SentMessage,
  deps: BotDeps,
  book: { isbn: string; title: string; author?: string }
): Promise<void> {
  const fanOut = await checkAllLibraries(deps.catalog, book.isbn, deps.libraries);
  await target.edit(formatAvailability(book, fanOut));
}

async function lookupIsbn(isbn: string, conversation: Conversation, deps: BotDeps): Promise<void> {
  const count = (deps.libraries ?? BUCHEON_LIBRARIES).length;
  const progress = await conversation.reply(`🔍 Checking ISBN ${isbn} at ${count} libraries...`);
  await showAvailability(progress, deps, { isbn, title: `ISBN ${isbn}` });
}

async function search(query: string, conversation: Conversation, deps: BotDeps): Promise<void> {
  if (!query) {
    await conversation.reply("Usage: /s <title>\nor: /s <ISBN>");
    return;
  }

  const isbn = isbnFromQuery(query);
  if (isbn) {
    await lookupIsbn(isbn, conversation, deps);
    return;
  }

  const progress = await conversation.reply(`🔍 Searching for '${query}'...`);
  const books = await deps.catalog.searchByTitle(query, INTERACTIVE_PAGE_SIZE);

  if (books.length === 0) {
    await progress.edit(`❌ No results for '${query}'.`);
    return;
  }

  if (books.length === 1) {
    const [book] = books;
    if (!book.isbn13) {
      await progress.edit(`❌ '${book.bookname || query}' has no ISBN to check.`);
      return;
    }
    await showAvailability(progress, deps, {
      isbn: book.isbn13,
      title: book.bookname || query,
      author: book.authors,
    });
    return;
  }

  await progress.edit(formatSearchResults(query, books));
}

const STATUS_LEGEND = "✅=available ❌=on loan 📭=not held ❓=unknown";

async function status(conversation: Conversation, deps: BotDeps): Promise<void> {
  const defaultLibrary = deps.defaultLibrary ?? DEFAULT_LIBRARY;
  const entries = await deps.watchlist.listAll();
  if (entries.length === 0) {
    await conversation.reply("📭 No books are being monitored.");
    return;
  }

  const progress = await conversation.reply(`🔍 Checking ${entries.length} books...`);
  const lines: string[] = [];

  for (const entry of entries) {
    if (!entry.title) continue;
    const libraryCode = entry.libraryCode || defaultLibrary.code;
    const libraryName = entry.libraryName || defaultLibrary.name;

    let isbn = entry.isbn;
    if (!isbn) {
      const [first] = await deps.catalog.searchByTitle(entry.title, INTERACTIVE_PAGE_SIZE);
      isbn = first?.isbn13;
    }

    let glyph = "❓";
    if (isbn) {
      const result = await deps.catalog.checkAvailability(libraryCode, isbn);
      if (result) glyph = !result.hasBook ? "📭" : result.loanAvailable ? "✅" : "❌";
    }
    lines.push(`${glyph} ${entry.title} @ ${libraryName}`);
  }

  await progress.edit(["📚 Watchlist status", "", ...lines, "", STATUS_LEGEND, DATA_CAVEAT].join("\n"));
}

async function list(conversation: Conversation, deps: BotDeps): Promise<void> {
  const entries = await deps.watchlist.listAll();
  if (entries.length === 0) {
    await conversation.reply("📭 No books are being monitored.");
    return;
  }
  const lines = entries.map(
    (entry, i) => `${i + 1}. ${entry.title || "(untitled)"} @ ${entry.libraryName || "(no library)"}`
  );
  await conversation.reply(["📚 Watchlist", "", ...lines].join("\n"));
}

async function add(title: string, conversation: Conversation, deps: BotDeps): Promise<void> {
  if (!title) {
    await conversation.reply("Usage: /a <title>");
    return;
  }
  const library = deps.defaultLibrary ?? DEFAULT_LIBRARY;
  const progress = await conversation.reply(`📝 Adding '${title}' to the watchlist...`);

  // Best effort: an entry without ISBN is resolved again on every check
  const [first] = await deps.catalog.searchByTitle(title, INTERACTIVE_PAGE_SIZE);
  const isbn = first?.isbn13 ?? "";

  const added = await deps.watchlist.append({
    title,
    libraryCode: library.code,
    libraryName: library.name,
    ...(isbn ? { isbn } : {}),
  });

  await progress.edit(
    added
      ? `✅ Added '${title}' to the watchlist${isbn ? ` (ISBN ${isbn})` : ""}.`
      : "❌ Could not add it. Add it to the sheet directly or try again later."
  );
}

async function remove(title: string, conversation: Conversation, deps: BotDeps): Promise<void> {
  if (!title) {
    await conversation.reply("Usage: /d <title>");
    return;
  }
  const removed = await deps.watchlist.deleteByTitle(title);
  await conversation.reply(
    removed ? `✅ Removed '${title}' from the watchlist.` : `❌ '${title}' is not on the watchlist.`
  );
}

async function dispatch(route: Route, conversation: Conversation, deps: BotDeps): Promise<void> {
  switch (route.kind) {
    case "help":
      await conversation.reply(HELP_TEXT);
      return;
    case "search":
      await search(route.query, conversation, deps);
      return;
    case "isbn":
      if (route.isbn) await lookupIsbn(route.isbn, conversation, deps);
      else await conversation.reply("❌ Invalid ISBN.");
      return;
    case "status":
      await status(conversation, deps);
      return;
    case "list":
      await list(conversation, deps);
      return;
    case "add":
      await add(route.title, conversation, deps);
      return;
    case "delete":
      await remove(route.title, conversation, deps);
      return;
    case "ignore":
      return;
  }
}

export async function handleMessage(text: string, conversation: Conversation, deps: BotDeps): Promise<void> {
  const logger = deps.logger ?? console;
  const route = routeMessage(text);
  if (route.kind !== "ignore") logger.info(`Command ${route.kind} received: ${text.trim()}`);

  try {
    await dispatch(route, conversation, deps);
  } catch (error) {
    logger.error(`Error handling "${text.trim()}": ${describeError(error)}`);
    try {
      await conversation.reply(`❌ Something went wrong: ${describeError(error)}`);
    } catch (replyError) {
      logger.error(`Failed to send error reply: ${describeError(replyError)}`);
    }
  }
}
