import fs from "fs";
import { parse } from "dotenv";
import { BootstrapError } from "../errors.js";
import { createSubLogger } from "./logger.js";

const log = createSubLogger("dotenv-config");

export type EnvTemplateEntry =
  | { kind: "pair"; key: string; value: string }
  | { kind: "comment"; text: string };

const pair = (key: string, value: string): EnvTemplateEntry => ({
  kind: "pair",
  key,
  value,
});

/**
 * Written to a fresh .env on first run. Blank vendor fields are filled in by
 * hand before any live SP-API call.
 */
export const DEFAULT_ENV_TEMPLATE: readonly EnvTemplateEntry[] = [
  pair("FLASK_SECRET", "dev-secret"),
  pair("MAX_CONTENT_LENGTH_MB", "300"),
  pair("FLASK_RUN_HOST", "0.0.0.0"),
  pair("FLASK_RUN_PORT", "5000"),
  pair("DRY_RUN", "true"),
  pair("SPAPI_SIMULATE", "true"),
  { kind: "comment", text: "Fill in before live submission:" },
  pair("SELLER_ID", ""),
  pair("MARKETPLACE_ID", ""),
  pair("LWA_CLIENT_ID", ""),
  pair("LWA_CLIENT_SECRET", ""),
  pair("LWA_REFRESH_TOKEN", ""),
  pair("AWS_ACCESS_KEY_ID", ""),
  pair("AWS_SECRET_ACCESS_KEY", ""),
  pair("AWS_REGION", "eu-west-1"),
  pair("SPAPI_ENDPOINT", "https://sellingpartnerapi-eu.amazon.com"),
];

export function renderEnvTemplate(
  entries: readonly EnvTemplateEntry[]
): string {
  return entries
    .map((entry) =>
      entry.kind === "pair" ? `${entry.key}=${entry.value}\n` : `# ${entry.text}\n`
    )
    .join("");
}

export interface EnsureConfigResult {
  path: string;
  created: boolean;
}

/**
 * Writes the default .env when none exists. An existing file is left exactly
 * as it is: no merge, no rewrite.
 */
export function ensureDefaultConfig(
  envPath: string,
  template: readonly EnvTemplateEntry[] = DEFAULT_ENV_TEMPLATE
): EnsureConfigResult {
  if (fs.existsSync(envPath)) {
    log.info(`Keeping existing config at ${envPath}`);
    return { path: envPath, created: false };
  }

  try {
    // Default OS permissions; the file holds secrets once edited.
    fs.writeFileSync(envPath, renderEnvTemplate(template));
  } catch (error) {
    throw new BootstrapError(
      "config",
      `Failed to write default config to ${envPath}`,
      { cause: error }
    );
  }

  log.info(`Created default config at ${envPath}`);
  return { path: envPath, created: true };
}

/**
 * Parses an env file the way dotenv does. A missing file reads as empty.
 */
export function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    log.warn(`No env file at ${envPath}, using process environment only`);
    return {};
  }
  return parse(fs.readFileSync(envPath, "utf8"));
}
