/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { ApiError, MissingCredentialError } from "@opsbridge/sdk";

const MAX_MESSAGE_LENGTH = 2000;

/**
 * Map errors to CLI exit codes
 * - 0: success, or usage shown on request
 * - 1: usage/validation/unknown error
 * - 2: missing credentials
 * - 3: API or transport error
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof MissingCredentialError) {
    return 2;
  }

  if (error instanceof ApiError) {
    return 3;
  }

  return 1;
}

function truncate(text: string): string {
  return text.length > MAX_MESSAGE_LENGTH
    ? text.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)"
    : text;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = truncate(error.message);

    if (error instanceof ApiError && error.rawBody) {
      message += `\n  Response: ${truncate(error.rawBody)}`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
