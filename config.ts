import { randomUUID } from "node:crypto";
import dotenv from "dotenv";
import { z } from "zod";
import type { ConnectionTarget } from "./types";
import { ConfigError } from "./errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  DISCORD_CLIENT_ID: optionalText,
  PLEX_TOKEN: optionalText,
  PLEX_USERNAME: optionalText,
  PLEX_SERVER_ADDRESS: optionalText,
  PLEX_SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(32400),
  PLEX_SERVER_OWNED: booleanFlag.default("false"),
  PLEX_SERVER_NAME: optionalText,
  PLEX_CLIENT_IDENTIFIER: optionalText,
  POLL_INTERVAL: z.coerce.number().int().min(1000).default(3000),
  DEBUG: booleanFlag.default("false"),
});

export interface AppConfig {
  discordClientId: string | undefined;
  plexToken: string | undefined;
  plexUsername: string | undefined;
  clientIdentifier: string;
  target: ConnectionTarget | null;
  pollInterval: number;
  debug: boolean;
}

export function isAuthenticated(config: AppConfig): boolean {
  return Boolean(config.plexToken && config.plexUsername);
}

const PLACEHOLDER_CLIENT_ID = "YOUR_CLIENT_ID_HERE";

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  // Empty strings from .env files mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${details.join("\n  ")}`, fields);
  }

  const values = parsed.data;
  const target: ConnectionTarget | null = values.PLEX_SERVER_ADDRESS
    ? {
        name: values.PLEX_SERVER_NAME,
        address: values.PLEX_SERVER_ADDRESS,
        port: values.PLEX_SERVER_PORT,
        owned: values.PLEX_SERVER_OWNED,
      }
    : null;

  return {
    discordClientId:
      values.DISCORD_CLIENT_ID === PLACEHOLDER_CLIENT_ID ? undefined : values.DISCORD_CLIENT_ID,
    plexToken: values.PLEX_TOKEN,
    plexUsername: values.PLEX_USERNAME,
    clientIdentifier: values.PLEX_CLIENT_IDENTIFIER ?? randomUUID(),
    target,
    pollInterval: values.POLL_INTERVAL,
    debug: values.DEBUG,
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
