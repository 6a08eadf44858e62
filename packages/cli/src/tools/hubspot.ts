import { hubspot } from "@opsbridge/sdk";
import type { ToolDefinition } from "../lib/tool.js";

export const hubspotTool: ToolDefinition<hubspot.HubspotCommand> = {
  bin: "hubspot-cli",
  description: "Work with HubSpot CRM records",
  keyLabel: hubspot.HUBSPOT_KEY_LABEL,
  keyValues: hubspot.OBJECT_TYPES.map((type) => type.name),
  service: hubspot.HUBSPOT_SERVICE,
  actions: hubspot.HUBSPOT_ACTIONS,
  examples: [
    "hubspot-cli get contacts -p Email=jane@example.com",
    "hubspot-cli get companies -p Domain=example.com",
    "hubspot-cli list companies -p Limit=20 -p IncludeSynthetic=true",
    `hubspot-cli update deals -p Id=123456 --json '{"Properties":{"dealstage":"closedwon"}}'`,
    "hubspot-cli associate contacts -p Id=101 -p ToType=companies -p ToId=202",
  ],
  decode: hubspot.decodeHubspotCommand,
  execute: hubspot.executeHubspotCommand,
};
