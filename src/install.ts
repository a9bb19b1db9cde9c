import { spawn } from "child_process";
import { accessSync, constants } from "fs";
import path from "path";
import { BootstrapError } from "./errors.js";
import { createSubLogger } from "./utils/logger.js";

const log = createSubLogger("install");

/**
 * Runs a command to completion. Resolves on exit code 0, rejects otherwise.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: { cwd: string }
) => Promise<void>;

export const runCommand: CommandRunner = (command, args, { cwd }) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: "inherit" });

    // ENOENT lands here when the command is not installed
    child.on("error", reject);

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
      } else if (signal) {
        reject(new Error(`${command} was terminated by ${signal}`));
      } else {
        reject(new Error(`${command} ${args.join(" ")} exited with code ${code}`));
      }
    });
  });
};

export interface InstallOptions {
  python: string;
  manifestPath: string;
  cwd: string;
}

/**
 * Upgrades pip, then installs every package listed in the manifest.
 */
export async function installDependencies(
  { python, manifestPath, cwd }: InstallOptions,
  runner: CommandRunner = runCommand
): Promise<void> {
  log.info("Upgrading pip");
  try {
    await runner(python, ["-m", "pip", "install", "--upgrade", "pip"], { cwd });
  } catch (error) {
    throw new BootstrapError("install", "Failed to upgrade pip", {
      cause: error,
    });
  }

  try {
    accessSync(path.resolve(cwd, manifestPath), constants.R_OK);
  } catch (error) {
    throw new BootstrapError(
      "install",
      `Dependency manifest not readable: ${manifestPath}`,
      { cause: error }
    );
  }

  log.info(`Installing dependencies from ${manifestPath}`);
  try {
    await runner(python, ["-m", "pip", "install", "-r", manifestPath], {
      cwd,
    });
  } catch (error) {
    throw new BootstrapError(
      "install",
      `Failed to install dependencies from ${manifestPath}`,
      { cause: error }
    );
  }
}
