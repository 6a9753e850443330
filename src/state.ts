import { existsSync, readFileSync, renameSync, writeFileSync } from "fs";
import { z } from "zod";
import { describeError } from "./errors.js";
import type { Flag, Logger, StateKey, StateMap } from "./types.js";

export const DEFAULT_STATE_FILE = "status.json";

const StateFileSchema = z.record(z.string(), z.string());

export function stateKey(key: StateKey): string {
  return `${key.isbn}_${key.libraryCode}`;
}

export function toFlag(available: boolean): Flag {
  return available ? "Y" : "N";
}

export function statesEqual(a: StateMap, b: StateMap): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

export interface StateStore {
  load(): StateMap;
  save(state: StateMap): void;
}

/**
 * Flat JSON file of last observed availability per (ISBN, library).
 * Entries are only ever added or overwritten. Single writer: two monitor
 * passes running at once would each rewrite the whole file.
 */
export function createStateStore(filePath: string = DEFAULT_STATE_FILE, logger: Logger = console): StateStore {
  return {
    load() {
      if (!existsSync(filePath)) return {};
      try {
        const content = readFileSync(filePath, "utf-8");
        const parsed = StateFileSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
          logger.error(`Failed to load state from ${filePath}: not a string mapping`);
          return {};
        }
        return parsed.data;
      } catch (error) {
        logger.error(`Failed to load state from ${filePath}: ${describeError(error)}`);
        return {};
      }
    },

    save(state) {
      const tempPath = `${filePath}.tmp`;
      try {
        writeFileSync(tempPath, `${JSON.stringify(state, null, 4)}\n`, "utf-8");
        renameSync(tempPath, filePath);
      } catch (error) {
        logger.error(`Failed to save state to ${filePath}: ${describeError(error)}`);
      }
    },
  };
}
