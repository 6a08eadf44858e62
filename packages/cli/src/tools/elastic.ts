import { elastic } from "@opsbridge/sdk";
import type { ToolDefinition } from "../lib/tool.js";

export const elasticTool: ToolDefinition<elastic.ElasticCommand> = {
  bin: "es-cli",
  description: "Query and manage an Elasticsearch cluster",
  keyLabel: elastic.ELASTIC_KEY_LABEL,
  service: elastic.ELASTIC_SERVICE,
  actions: elastic.ELASTIC_ACTIONS,
  examples: [
    "es-cli health",
    "es-cli indices 'app-logs-*'",
    `es-cli search 'app-logs-*' --json '{"Query":{"match":{"level":"error"}},"Size":20}'`,
    "es-cli stats 'app-logs-*' -p TermsField=service.keyword -p DateField=@timestamp -p Gte=now-7d",
    `es-cli update app-logs-2024.01 -p Id=42 --json '{"Document":{"status":"closed"}}'`,
  ],
  decode: elastic.decodeElasticCommand,
  execute: elastic.executeElasticCommand,
};
