/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import type { Readable } from "node:stream";
import { InvalidParameterError, parseParameterJson, type ParameterBag } from "@opsbridge/sdk";

const STDIN_LIMIT_BYTES = 10 * 1024 * 1024;

/**
 * Read `--json -` input to the end, refusing more than `maxBytes`
 */
export async function readStdin(
  input: Readable = process.stdin,
  maxBytes = STDIN_LIMIT_BYTES
): Promise<string> {
  input.setEncoding("utf8");
  let data = "";
  let bytesRead = 0;

  for await (const chunk of input) {
    const text = String(chunk);
    bytesRead += Buffer.byteLength(text, "utf8");
    if (bytesRead > maxBytes) {
      throw new InvalidParameterError("--json", "*", `stdin exceeds ${maxBytes} bytes`);
    }
    data += text;
  }

  return data;
}

/**
 * Read a parameter map from a JSON file
 */
export async function readParamsFile(filePath: string): Promise<ParameterBag> {
  const content = await fs.readFile(filePath, "utf8");
  return parseParameterJson(content, `file ${filePath}`);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
