import { DEFAULT_OPTIONS } from "../index.js";
import type { BootstrapOptions } from "../index.js";

export type CliCommand = "bootstrap" | "settings" | "help";

export interface ParsedCli {
  command: CliCommand;
  options: BootstrapOptions;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ValueOption = Exclude<keyof BootstrapOptions, "cwd" | "skipInstall" | "port">;

const VALUE_FLAGS = new Map<string, ValueOption | "port">([
  ["--env-file", "envFile"],
  ["-e", "envFile"],
  ["--manifest", "manifest"],
  ["-m", "manifest"],
  ["--log-file", "logFile"],
  ["-l", "logFile"],
  ["--python", "python"],
  ["--app", "app"],
  ["--host", "host"],
  ["--port", "port"],
  ["-p", "port"],
]);

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new UsageError(`Invalid port: ${raw}`);
  }
  return port;
}

/**
 * Parses argv (without the node and script entries). No arguments means a
 * full bootstrap with the defaults.
 */
export function parseCliArgs(args: string[], cwd: string): ParsedCli {
  const options: BootstrapOptions = { cwd, ...DEFAULT_OPTIONS };
  let command: CliCommand = "bootstrap";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help", options };
    }
    if (arg === "--skip-install") {
      options.skipInstall = true;
      continue;
    }
    if (i === 0 && arg === "settings") {
      command = "settings";
      continue;
    }

    const target = VALUE_FLAGS.get(arg);
    if (target === undefined) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    if (i + 1 >= args.length || args[i + 1].startsWith("-")) {
      throw new UsageError(`Missing value for ${arg}`);
    }

    const value = args[++i];
    if (target === "port") {
      options.port = parsePort(value);
    } else {
      options[target] = value;
    }
  }

  return { command, options };
}

export const USAGE = `
devbox-bootstrap: install dependencies, write a default .env, start the web app

Usage:
  devbox-bootstrap [options]
  devbox-bootstrap settings [--env-file <path>]

Options:
  --env-file, -e <path>    Config file to create if missing (default: .env)
  --manifest, -m <path>    Dependency manifest (default: requirements.txt)
  --log-file, -l <path>    Web app log, truncated each run (default: /tmp/flask.log)
  --python <cmd>           Python interpreter (default: python)
  --app <file>             Flask app entry point (default: app_flask.py)
  --host <host>            Bind host (default: 0.0.0.0)
  --port, -p <port>        Bind port (default: 5000)
  --skip-install           Do not run pip
  --help, -h               Show this help message

Environment Variables:
  LOG_LEVEL                debug, info, warn or error (default: info)

Examples:
  devbox-bootstrap
  devbox-bootstrap --skip-install -p 8000
  devbox-bootstrap settings -e .env.staging
`;
