/**
 * Per-invocation metrics, printed as `metric <key> field=value ...` lines when
 * OPSBRIDGE_CLI_DEBUG=1
 */

import { isVerbose, type Environment } from "./env.js";
import type { Writer } from "./render.js";

const LINE_BREAKS = /[\r\n]+/g;

export interface MetricSink {
  env: Environment;
  out: Writer;
}

function metricPart(part: unknown): string {
  return String(part).replace(LINE_BREAKS, " ").trim();
}

export function emitMetric(key: string, fields: Record<string, unknown>, sink: MetricSink): void {
  if (!isVerbose(sink.env)) {
    return;
  }

  const parts = [`metric ${metricPart(key)}`];
  for (const [name, value] of Object.entries(fields)) {
    parts.push(`${metricPart(name)}=${metricPart(value)}`);
  }

  sink.out.write(parts.join(" ") + "\n");
}

/**
 * Time one service call and report its duration and outcome, also when it throws
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>, sink: MetricSink): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success }, sink);
  }
}
