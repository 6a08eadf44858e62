/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { ParameterBag } from "@opsbridge/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 10000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Read a --param value: JSON when it parses, the raw text otherwise.
 * Whole numbers a double cannot hold exactly stay as text.
 */
export function parseParamValue(raw: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (typeof parsed === "number" && Number.isInteger(parsed) && !Number.isSafeInteger(parsed)) {
    return raw.trim();
  }
  return parsed;
}

/**
 * Collect one `Key=Value` entry into the structured parameter map
 */
export function parseParamEntry(entry: string, previous: ParameterBag): ParameterBag {
  const separator = entry.indexOf("=");
  const key = separator > 0 ? entry.slice(0, separator).trim() : "";

  if (!key) {
    throw new InvalidArgumentError(`expected Key=Value, got "${entry}"`);
  }

  return { ...previous, [key]: parseParamValue(entry.slice(separator + 1)) };
}
