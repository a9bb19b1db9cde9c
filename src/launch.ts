import { spawn } from "child_process";
import type { ChildProcess, SpawnOptions } from "child_process";
import path from "path";
import { BootstrapError } from "./errors.js";
import { closeLog, openTruncatedLog } from "./utils/fileLogger.js";
import { createSubLogger } from "./utils/logger.js";

const log = createSubLogger("launch");

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnOptions
) => ChildProcess;

export interface LaunchOptions {
  python: string;
  app: string;
  host: string;
  port: number;
  logPath: string;
  cwd: string;
}

export interface LaunchedProcess {
  pid: number | undefined;
  logPath: string;
  child: ChildProcess;
}

export function flaskArgs({
  app,
  host,
  port,
}: Pick<LaunchOptions, "app" | "host" | "port">): string[] {
  return ["-m", "flask", "--app", app, "run", `--host=${host}`, `--port=${port}`];
}

/**
 * Starts the web app in the background and returns without waiting on it.
 * stdout and stderr share one truncated log file; whatever happens to the
 * process after this point shows up only in that log.
 */
export function launchDetached(
  options: LaunchOptions,
  spawnFn: SpawnFn = spawn
): LaunchedProcess {
  const logPath = path.resolve(options.cwd, options.logPath);

  let fd: number;
  try {
    fd = openTruncatedLog(logPath);
  } catch (error) {
    throw new BootstrapError("launch", `Failed to open log file ${logPath}`, {
      cause: error,
    });
  }

  const args = flaskArgs(options);
  let child: ChildProcess;
  try {
    child = spawnFn(options.python, args, {
      cwd: options.cwd,
      detached: true,
      stdio: ["ignore", fd, fd],
    });
  } catch (error) {
    throw new BootstrapError("launch", `Failed to spawn ${options.python}`, {
      cause: error,
    });
  } finally {
    // The child holds its own copy of the descriptor
    closeLog(fd);
  }

  // Fire and forget: a failed start is not the bootstrap's error
  child.on("error", (error) => {
    log.debug("Background process reported an error", { error });
  });
  child.unref();

  log.info(`Launched ${options.python} ${args.join(" ")}`, {
    pid: child.pid,
    logPath,
  });
  return { pid: child.pid, logPath, child };
}
