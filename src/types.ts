export type Flag = "Y" | "N";

export interface WatchEntry {
  title: string;
  libraryCode: string;
  libraryName: string;
  isbn?: string;
}

export interface BookDoc {
  isbn13: string;
  bookname: string;
  authors: string;
  publisher?: string;
  publicationYear?: string;
}

export interface AvailabilityResult {
  hasBook: boolean;
  loanAvailable: boolean;
}

export interface StateKey {
  isbn: string;
  libraryCode: string;
}

// Persisted as `${isbn}_${libraryCode}` -> "Y" | "N"
export type StateMap = Record<string, string>;

export interface Library {
  code: string;
  name: string;
}

export type Logger = Pick<Console, "info" | "warn" | "error">;
