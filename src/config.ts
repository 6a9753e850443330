import "dotenv/config";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const ConfigSchema = z.object({
  LIBRARY_API_KEY: optionalSecret,
  LIBRARY_API_BASE_URL: z.string().url().default("http://data4library.kr/api"),
  TELEGRAM_BOT_TOKEN: optionalSecret,
  TELEGRAM_CHAT_ID: optionalSecret,
  // Raw JSON; may contain newlines, so it is not trimmed
  GOOGLE_SHEET_CREDENTIALS: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value : undefined)),
  GOOGLE_SHEET_URL: optionalSecret,
  STATE_FILE: z.string().trim().min(1).default("status.json"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(500).max(120_000).default(10_000),
  MONITOR_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(500),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  RENDER: optionalSecret,
});

export type Config = z.infer<typeof ConfigSchema>;

type SecretName =
  | "LIBRARY_API_KEY"
  | "TELEGRAM_BOT_TOKEN"
  | "TELEGRAM_CHAT_ID"
  | "GOOGLE_SHEET_CREDENTIALS"
  | "GOOGLE_SHEET_URL";

const SECRET_NAMES: SecretName[] = [
  "LIBRARY_API_KEY",
  "TELEGRAM_BOT_TOKEN",
  "TELEGRAM_CHAT_ID",
  "GOOGLE_SHEET_CREDENTIALS",
  "GOOGLE_SHEET_URL",
];

export function readConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${message}`);
  }
  return parsed.data;
}

export function missingSettings(config: Config): SecretName[] {
  return SECRET_NAMES.filter((name) => !config[name]);
}

export function requireSetting(config: Config, name: SecretName): string {
  const value = config[name];
  if (!value) throw new ConfigurationError(name);
  return value;
}

// Liveness responder port, or null when no hosting platform is probing us
export function healthPort(config: Config): number | null {
  if (config.PORT === undefined && !config.RENDER) return null;
  return config.PORT ?? 8443;
}
