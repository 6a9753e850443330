export type CatalogErrorKind = "transport" | "decode";

export class CatalogError extends Error {
  readonly kind: CatalogErrorKind;

  constructor(kind: CatalogErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogError";
    this.kind = kind;
  }
}

export class ConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string, message?: string) {
    super(message ?? `${setting} is not configured`);
    this.name = "ConfigurationError";
    this.setting = setting;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
