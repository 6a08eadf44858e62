/**
 * Usage text generated from a tool's action catalog
 */

import { credentialVariables, describeParameters, type ActionDefinition } from "@opsbridge/sdk";
import type { ToolDefinition } from "./tool.js";

const COLUMN = 28;

function actionLine(definition: ActionDefinition, keyLabel: string): string[] {
  const key =
    definition.key === "required" ? ` <${keyLabel}>` : definition.key === "optional" ? ` [${keyLabel}]` : "";
  const lines = [`  ${(definition.name + key).padEnd(COLUMN)}${definition.summary}`];

  const params = describeParameters(definition);
  if (params.length > 0) {
    const names = params.map((param) => (param.required ? `${param.name}*` : param.name));
    lines.push(`  ${"".padEnd(COLUMN)}params: ${names.join(", ")}`);
  }
  if (definition.notes) {
    lines.push(`  ${"".padEnd(COLUMN)}${definition.notes}`);
  }
  return lines;
}

export function renderUsage<C extends { action: string }>(tool: ToolDefinition<C>): string {
  const lines = [
    `Usage: ${tool.bin} <action> [${tool.keyLabel}] [-p Key=Value ...] [--json '<object>']`,
    "",
    tool.description,
    "",
    "Actions:",
    ...tool.actions.flatMap((definition) => actionLine(definition, tool.keyLabel)),
    "",
    "  * required parameter",
  ];

  if (tool.keyValues) {
    lines.push("", `${tool.keyLabel}: ${tool.keyValues.join(", ")}`);
  }

  lines.push("", "Environment:");
  for (const variable of credentialVariables(tool.service.credentials)) {
    lines.push(`  ${variable.padEnd(COLUMN)}prompted for when unset`);
  }
  lines.push(
    `  ${tool.service.baseUrlEnv.padEnd(COLUMN)}base URL (default ${tool.service.defaultBaseUrl})`,
    `  ${"OPSBRIDGE_TIMEOUT_MS".padEnd(COLUMN)}request timeout in milliseconds`,
    `  ${"OPSBRIDGE_LOG_LEVEL".padEnd(COLUMN)}debug, info, warn or error`,
    "",
    "Examples:",
    ...tool.examples.map((example) => `  ${example}`)
  );

  return lines.join("\n") + "\n";
}
