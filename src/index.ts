import path from "path";
import { installDependencies, runCommand } from "./install.js";
import type { CommandRunner } from "./install.js";
import { launchDetached } from "./launch.js";
import type { SpawnFn } from "./launch.js";
import { ensureDefaultConfig } from "./utils/dotenv-config.js";
import { createSubLogger } from "./utils/logger.js";

export { BootstrapError, SettingsError } from "./errors.js";
export type { BootstrapStep } from "./errors.js";
export {
  DEFAULT_ENV_TEMPLATE,
  ensureDefaultConfig,
  renderEnvTemplate,
} from "./utils/dotenv-config.js";
export { installDependencies } from "./install.js";
export { launchDetached, flaskArgs } from "./launch.js";
export { loadSettings, missingLiveCredentials, redactSettings } from "./settings.js";
export type { Settings } from "./settings.js";

const log = createSubLogger("bootstrap");

export interface BootstrapOptions {
  cwd: string;
  envFile: string;
  manifest: string;
  logFile: string;
  python: string;
  app: string;
  host: string;
  port: number;
  skipInstall: boolean;
}

export const DEFAULT_OPTIONS: Omit<BootstrapOptions, "cwd"> = {
  envFile: ".env",
  manifest: "requirements.txt",
  logFile: "/tmp/flask.log",
  python: "python",
  app: "app_flask.py",
  host: "0.0.0.0",
  port: 5000,
  skipInstall: false,
};

export interface BootstrapDeps {
  runner?: CommandRunner;
  spawnFn?: SpawnFn;
}

export interface BootstrapResult {
  configCreated: boolean;
  envPath: string;
  pid: number | undefined;
  logPath: string;
}

/**
 * Install, write the default config, launch. Each step throws on failure and
 * nothing after a failed step runs.
 */
export async function runBootstrap(
  options: BootstrapOptions,
  { runner = runCommand, spawnFn }: BootstrapDeps = {}
): Promise<BootstrapResult> {
  const { cwd } = options;

  if (options.skipInstall) {
    log.info("Skipping dependency install");
  } else {
    await installDependencies(
      { python: options.python, manifestPath: options.manifest, cwd },
      runner
    );
  }

  const envPath = path.resolve(cwd, options.envFile);
  const { created } = ensureDefaultConfig(envPath);

  const launched = launchDetached(
    {
      python: options.python,
      app: options.app,
      host: options.host,
      port: options.port,
      logPath: options.logFile,
      cwd,
    },
    spawnFn
  );

  return {
    configCreated: created,
    envPath,
    pid: launched.pid,
    logPath: launched.logPath,
  };
}
