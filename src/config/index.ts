import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "../shared/errors.js";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: logLevelSchema.default("info"),
  MEETINGS_CONNECTION_STRING: z.string().min(1),
  EMAILS_FROM_EMAIL: z.string().email(),
  SECURITY_TEXT_ENCRYPTION_KEY: z.string().min(1).optional(),
  AUTH_AUTHORITY: z.string().url(),
  AUTH_AUDIENCE: z.string().min(1).default("meetings-api"),
  AUTH_JWKS_URI: z.string().url().optional(),
  AUTH_SIGNING_SECRET: z.string().min(16).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type RawConfig = Record<string, unknown>;

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface LoadRawConfigOptions {
  settingsDir?: string;
  env?: NodeJS.ProcessEnv;
}

function readSettingsFile(filePath: string): RawConfig {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Settings file ${filePath} is not valid JSON`, { cause: error });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Settings file ${filePath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function definedEntries(env: NodeJS.ProcessEnv): RawConfig {
  const result: RawConfig = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Merges `settings.json`, the `settings.<NODE_ENV>.json` override and the process
 * environment, in increasing precedence. The result is not validated yet.
 */
export function loadRawConfig(options: LoadRawConfigOptions = {}): RawConfig {
  if (!options.env) {
    dotenv.config();
  }
  const env = options.env ?? process.env;
  const settingsDir = options.settingsDir ?? path.resolve(process.cwd(), "config");
  const environmentName = env["NODE_ENV"] ?? "development";

  return {
    ...readSettingsFile(path.join(settingsDir, "settings.json")),
    ...readSettingsFile(path.join(settingsDir, `settings.${environmentName}.json`)),
    ...definedEntries(env),
  };
}

export function parseConfig(raw: RawConfig): EnvConfig {
  const parsed = envSchema.safeParse(raw);

  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${message}`);
  }

  return parsed.data;
}

/** Reads `LOG_LEVEL` ahead of the full parse, so the root logger exists before the rest is validated. */
export function parseLogLevel(raw: RawConfig): LogLevel {
  const parsed = logLevelSchema.default("info").safeParse(raw["LOG_LEVEL"]);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: LOG_LEVEL: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

export function loadConfig(options: LoadRawConfigOptions = {}): EnvConfig {
  return parseConfig(loadRawConfig(options));
}
