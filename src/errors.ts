import type { ZodIssue } from "zod";

export type BootstrapStep = "install" | "config" | "launch";

/**
 * Raised by any bootstrap step. The CLI treats every one as fatal.
 */
export class BootstrapError extends Error {
  constructor(
    public readonly step: BootstrapStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BootstrapError";
  }
}

export class SettingsError extends Error {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Invalid settings: ${issues
        .map((issue) => `${issue.path.join(".")} (${issue.message})`)
        .join(", ")}`
    );
    this.name = "SettingsError";
  }
}
