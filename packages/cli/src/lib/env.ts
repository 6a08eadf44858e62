/**
 * Environment and configuration resolution
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import type { ServiceConfig } from "@opsbridge/sdk";

export type Environment = Record<string, string | undefined>;

const BaseUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must use http or https");

/**
 * Resolve a service base URL
 * Priority: CLI option > service env var > built-in default
 */
export function resolveBaseUrl(
  service: ServiceConfig,
  cliBaseUrl?: string,
  env: Environment = process.env
): string {
  const candidate = cliBaseUrl ?? env[service.baseUrlEnv] ?? service.defaultBaseUrl;
  const parsed = BaseUrlSchema.safeParse(candidate);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? "invalid URL";
    throw new InvalidArgumentError(`Invalid ${service.name} base URL "${candidate}": ${reason}`);
  }
  return parsed.data.replace(/\/+$/, "");
}

/**
 * Resolve the request timeout
 * Priority: CLI option > OPSBRIDGE_TIMEOUT_MS > transport default
 */
export function resolveTimeoutMs(cliTimeout?: number, env: Environment = process.env): number | undefined {
  if (cliTimeout !== undefined) {
    return cliTimeout;
  }
  const raw = env.OPSBRIDGE_TIMEOUT_MS?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(`OPSBRIDGE_TIMEOUT_MS must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: Environment = process.env): boolean {
  return env.OPSBRIDGE_CLI_DEBUG === "1";
}
