import path from "path";
import { runBootstrap } from "./index.js";
import type { BootstrapDeps } from "./index.js";
import {
  loadSettings,
  missingLiveCredentials,
  redactSettings,
} from "./settings.js";
import { parseCliArgs, UsageError, USAGE } from "./utils/args.js";
import type { ParsedCli } from "./utils/args.js";
import { createSubLogger } from "./utils/logger.js";

const log = createSubLogger("cli");

export interface RunCliOptions extends BootstrapDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export async function runCli(
  args: string[],
  { cwd = process.cwd(), env = process.env, ...deps }: RunCliOptions = {}
): Promise<number> {
  let parsed: ParsedCli;
  try {
    parsed = parseCliArgs(args, cwd);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const { command, options } = parsed;
  if (command === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    if (command === "settings") {
      const settings = loadSettings({
        envPath: path.resolve(options.cwd, options.envFile),
        env,
      });
      console.log(JSON.stringify(redactSettings(settings), null, 2));

      const missing = missingLiveCredentials(settings);
      if (!settings.simulate && missing.length > 0) {
        log.warn("Live SP-API calls need these values filled in", { missing });
      }
      return 0;
    }

    const result = await runBootstrap(options, deps);
    log.info("Bootstrap complete", result);
    return 0;
  } catch (error) {
    log.error(`${command === "settings" ? "Settings" : "Bootstrap"} failed`, {
      error,
      cause: error instanceof Error ? error.cause : undefined,
    });
    return 1;
  }
}
