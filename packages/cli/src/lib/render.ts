/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

export interface Writer {
  write(chunk: string): unknown;
}

/**
 * Print JSON to an output stream
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }, out: Writer = process.stdout): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  out.write(`${json ?? "null"}\n`);
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: { isTTY?: boolean } = process.stdout): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
