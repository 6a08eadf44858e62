/**
 * Captured output streams
 */

export interface CapturedStream {
  write(chunk: string): boolean;
  text(): string;
}

export function captureStream(): CapturedStream {
  const chunks: string[] = [];
  return {
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    text(): string {
      return chunks.join("");
    },
  };
}
