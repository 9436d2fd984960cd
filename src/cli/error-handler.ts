/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { ZodError } from "zod";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  readonly code: string;
  readonly suggestion?: string;

  constructor(message: string, options: { code: string; suggestion?: string } = { code: "CLI_ERROR" }) {
    super(message);
    this.name = "CliError";
    this.code = options.code;
    this.suggestion = options.suggestion;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "CONFIG_ERROR", suggestion });
    this.name = "ConfigError";
  }
}

const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your hostbridge.config.json file for issues.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'hostbridge --help' for usage information.",
  },
};

/**
 * Turns a zod validation failure of the config file into a ConfigError.
 */
export function toConfigError(err: unknown, configPath: string): unknown {
  if (err instanceof ZodError) {
    const details = err.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return new ConfigError(`Invalid config ${configPath}: ${details}`);
  }
  if (err instanceof SyntaxError) {
    return new ConfigError(`Config ${configPath} is not valid JSON: ${err.message}`);
  }
  return err;
}

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? ERROR_MESSAGES.CLI_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Runs a command action; failures are printed and set a non-zero exit code.
 */
export async function handleError(fn: () => Promise<unknown>, verbose = false): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exitCode = 1;
  }
}
