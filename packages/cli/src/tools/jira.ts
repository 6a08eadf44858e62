import { jira } from "@opsbridge/sdk";
import type { ToolDefinition } from "../lib/tool.js";

export const jiraTool: ToolDefinition<jira.JiraCommand> = {
  bin: "jira-cli",
  description: "Read and update issues in a Jira instance",
  keyLabel: jira.JIRA_KEY_LABEL,
  service: jira.JIRA_SERVICE,
  actions: jira.JIRA_ACTIONS,
  examples: [
    "jira-cli get OPS-123",
    `jira-cli search --json '{"Jql":"project = OPS AND status = Open","MaxResults":20}'`,
    "jira-cli history OPS-123",
    `jira-cli transition OPS-123 -p 'Transition=In Progress' -p 'Comment=Picking this up'`,
    `jira-cli create --json '{"Fields":{"project":{"key":"OPS"},"summary":"Disk alert","issuetype":{"name":"Task"}}}'`,
  ],
  decode: jira.decodeJiraCommand,
  execute: jira.executeJiraCommand,
};
