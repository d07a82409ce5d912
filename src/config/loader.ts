// ============================================================================
// CONFIG LOADER — YAML file → validated AppConfig
// ============================================================================

import { readFile } from "fs/promises";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import { AppConfigSchema, type AppConfig } from "./schema";

/** Configuration file could not be parsed or failed validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validate an already-parsed value. `undefined`/`null` (an empty file) yields the defaults. */
export function parseConfig(raw: unknown, source = "configuration"): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}`, result.error.issues.map(formatIssue));
  }
  return result.data;
}

/** Parse YAML text into a validated config. */
export function parseConfigText(text: string, source = "configuration"): AppConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(raw, source);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load configuration from a YAML file. Without a path, or when the file
 * does not exist, the built-in defaults apply.
 */
export async function loadConfig(path?: string): Promise<AppConfig> {
  if (!path) return parseConfig(undefined);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      console.warn(`[loadConfig] ${path} not found, using defaults`);
      return parseConfig(undefined);
    }
    throw new ConfigError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = parseConfigText(text, path);
  console.log(`[loadConfig] Loaded configuration from ${path}`);
  return config;
}
