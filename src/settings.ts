import { z } from "zod";
import { SettingsError } from "./errors.js";
import { readEnvFile } from "./utils/dotenv-config.js";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

// Blank KEY= lines mean "not set"
const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const textWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value) =>
        value === undefined ? fallback : TRUTHY.has(value.trim().toLowerCase())
      )
  );

const envSchema = z.object({
  FLASK_SECRET: textWithDefault("dev"),
  MAX_CONTENT_LENGTH_MB: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(300)
  ),
  FLASK_RUN_HOST: textWithDefault("0.0.0.0"),
  FLASK_RUN_PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(65535).default(5000)
  ),
  DRY_RUN: flag(true),
  SPAPI_SIMULATE: flag(true),
  SELLER_ID: optionalText,
  MARKETPLACE_ID: textWithDefault("A1RKKUPIHCS9HS"),
  LWA_CLIENT_ID: optionalText,
  LWA_CLIENT_SECRET: optionalText,
  LWA_REFRESH_TOKEN: optionalText,
  AWS_ACCESS_KEY_ID: optionalText,
  AWS_SECRET_ACCESS_KEY: optionalText,
  AWS_REGION: textWithDefault("eu-west-1"),
  SPAPI_ENDPOINT: textWithDefault("https://sellingpartnerapi-eu.amazon.com"),
});

export interface Settings {
  flaskSecret: string;
  maxContentLengthMb: number;
  host: string;
  port: number;
  dryRun: boolean;
  simulate: boolean;
  sellerId?: string;
  marketplaceId: string;
  lwaClientId?: string;
  lwaClientSecret?: string;
  lwaRefreshToken?: string;
  awsAccessKeyId?: string;
  awsSecretAccessKey?: string;
  awsRegion: string;
  spapiEndpoint: string;
}

export interface LoadSettingsOptions {
  envPath: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the env file once into an immutable record. Variables already present
 * in `env` take precedence over the file, as with dotenv's `config()`.
 */
export function loadSettings({
  envPath,
  env = process.env,
}: LoadSettingsOptions): Readonly<Settings> {
  const fromFile = readEnvFile(envPath);
  const merged: Record<string, string | undefined> = { ...fromFile };
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new SettingsError(parsed.error.issues);
  }

  const raw = parsed.data;
  return Object.freeze({
    flaskSecret: raw.FLASK_SECRET,
    maxContentLengthMb: raw.MAX_CONTENT_LENGTH_MB,
    host: raw.FLASK_RUN_HOST,
    port: raw.FLASK_RUN_PORT,
    dryRun: raw.DRY_RUN,
    simulate: raw.SPAPI_SIMULATE,
    sellerId: raw.SELLER_ID,
    marketplaceId: raw.MARKETPLACE_ID,
    lwaClientId: raw.LWA_CLIENT_ID,
    lwaClientSecret: raw.LWA_CLIENT_SECRET,
    lwaRefreshToken: raw.LWA_REFRESH_TOKEN,
    awsAccessKeyId: raw.AWS_ACCESS_KEY_ID,
    awsSecretAccessKey: raw.AWS_SECRET_ACCESS_KEY,
    awsRegion: raw.AWS_REGION,
    spapiEndpoint: raw.SPAPI_ENDPOINT,
  });
}

const LIVE_CREDENTIALS = [
  ["SELLER_ID", "sellerId"],
  ["LWA_CLIENT_ID", "lwaClientId"],
  ["LWA_CLIENT_SECRET", "lwaClientSecret"],
  ["LWA_REFRESH_TOKEN", "lwaRefreshToken"],
  ["AWS_ACCESS_KEY_ID", "awsAccessKeyId"],
  ["AWS_SECRET_ACCESS_KEY", "awsSecretAccessKey"],
] as const satisfies ReadonlyArray<readonly [string, keyof Settings]>;

/**
 * Env keys still blank that a live (non-simulated) SP-API call needs.
 */
export function missingLiveCredentials(settings: Readonly<Settings>): string[] {
  return LIVE_CREDENTIALS.filter(([, field]) => !settings[field]).map(
    ([envKey]) => envKey
  );
}

const SECRET_FIELDS: ReadonlySet<string> = new Set([
  "flaskSecret",
  "lwaClientSecret",
  "lwaRefreshToken",
  "awsSecretAccessKey",
]);

/**
 * Display copy of the settings with secrets masked and unset fields as null.
 */
export function redactSettings(
  settings: Readonly<Settings>
): Record<string, string | number | boolean | null> {
  const out: Record<string, string | number | boolean | null> = {};
  const entries: Array<[string, Settings[keyof Settings]]> =
    Object.entries(settings);
  for (const [field, value] of entries) {
    if (value === undefined) {
      out[field] = null;
    } else if (SECRET_FIELDS.has(field)) {
      out[field] = "********";
    } else {
      out[field] = value;
    }
  }
  return out;
}
