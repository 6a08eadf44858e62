/**
 * JIRA action catalog and parameter decoding
 */

import { z } from "zod";
import {
  findAction,
  requirePrimaryKey,
  type ActionDefinition,
  type ServiceConfig,
} from "../../actions.js";
import { UnsupportedActionError } from "../../errors.js";
import {
  asText,
  decodeParameters,
  FlagSchema,
  NameListSchema,
  ObjectSchema,
  PageSizeSchema,
  type ParameterBag,
} from "../../params.js";

export const JIRA_SERVICE: ServiceConfig = {
  name: "JIRA",
  baseUrlEnv: "JIRA_BASE_URL",
  defaultBaseUrl: "https://jira.example.com",
  credentials: {
    kind: "basic",
    service: "JIRA",
    principalEnv: "JIRA_USERNAME",
    secretEnv: "JIRA_API_TOKEN",
  },
};

export const JIRA_KEY_LABEL = "issueKey";

export const DEFAULT_MAX_RESULTS = 50;

const NoParamsSchema = z.object({});

export const GetIssueParamsSchema = z.object({
  Expand: NameListSchema.optional(),
  IncludeChangelog: FlagSchema.optional(),
  Fields: NameListSchema.optional(),
});

export const SearchParamsSchema = z.object({
  Jql: asText(z.string().trim().min(1)),
  MaxResults: PageSizeSchema.default(DEFAULT_MAX_RESULTS),
  StartAt: PageSizeSchema.default(0),
  Fields: NameListSchema.optional(),
});

export const TransitionParamsSchema = z.object({
  Transition: asText(z.string().min(1)),
  Comment: asText(z.string().min(1)).optional(),
});

export const FieldsParamsSchema = z.object({
  Fields: ObjectSchema,
});

export const CommentParamsSchema = z.object({
  Body: asText(z.string().min(1)),
});

export const AssignParamsSchema = z.object({
  Assignee: asText(z.string().min(1)),
});

export type GetIssueParams = z.output<typeof GetIssueParamsSchema>;
export type SearchParams = z.output<typeof SearchParamsSchema>;
export type TransitionParams = z.output<typeof TransitionParamsSchema>;

export const JIRA_ACTIONS: readonly ActionDefinition[] = [
  { name: "serverinfo", summary: "Server version and health", key: "none", schema: NoParamsSchema },
  { name: "myself", summary: "The authenticated user", key: "none", schema: NoParamsSchema },
  { name: "projects", summary: "List visible projects", key: "none", schema: NoParamsSchema },
  {
    name: "get",
    summary: "Fetch an issue (IncludeChangelog=true adds the change log)",
    key: "required",
    schema: GetIssueParamsSchema,
  },
  {
    name: "search",
    summary: `Search issues with JQL (MaxResults defaults to ${DEFAULT_MAX_RESULTS}, StartAt to 0)`,
    key: "none",
    schema: SearchParamsSchema,
  },
  {
    name: "history",
    summary: "Status transitions derived from the change log",
    key: "required",
    schema: NoParamsSchema,
  },
  { name: "transitions", summary: "Transitions currently available", key: "required", schema: NoParamsSchema },
  {
    name: "transition",
    summary: "Move an issue through the transition with this exact name",
    key: "required",
    schema: TransitionParamsSchema,
  },
  { name: "create", summary: "Create an issue from a field map", key: "none", schema: FieldsParamsSchema },
  { name: "update", summary: "Update issue fields", key: "required", schema: FieldsParamsSchema },
  { name: "comment", summary: "Add a comment", key: "required", schema: CommentParamsSchema },
  { name: "comments", summary: "List comments", key: "required", schema: NoParamsSchema },
  { name: "assign", summary: "Assign to a user name", key: "required", schema: AssignParamsSchema },
];

export type JiraCommand =
  | { action: "serverinfo" }
  | { action: "myself" }
  | { action: "projects" }
  | { action: "get"; key: string; params: GetIssueParams }
  | { action: "search"; params: SearchParams }
  | { action: "history"; key: string }
  | { action: "transitions"; key: string }
  | { action: "transition"; key: string; params: TransitionParams }
  | { action: "create"; fields: Record<string, unknown> }
  | { action: "update"; key: string; fields: Record<string, unknown> }
  | { action: "comment"; key: string; body: string }
  | { action: "comments"; key: string }
  | { action: "assign"; key: string; assignee: string };

/**
 * Decode an action name, issue key and parameter bag into a typed command
 */
export function decodeJiraCommand(
  action: string,
  issueKey: string | undefined,
  bag: ParameterBag
): JiraCommand {
  const definition = findAction(JIRA_ACTIONS, action);
  const key = (): string => requirePrimaryKey(definition, issueKey, JIRA_KEY_LABEL);

  switch (definition.name) {
    case "serverinfo":
      return { action: "serverinfo" };
    case "myself":
      return { action: "myself" };
    case "projects":
      return { action: "projects" };
    case "get":
      return { action: "get", key: key(), params: decodeParameters(GetIssueParamsSchema, bag, "get") };
    case "search":
      return { action: "search", params: decodeParameters(SearchParamsSchema, bag, "search") };
    case "history":
      return { action: "history", key: key() };
    case "transitions":
      return { action: "transitions", key: key() };
    case "transition":
      return {
        action: "transition",
        key: key(),
        params: decodeParameters(TransitionParamsSchema, bag, "transition"),
      };
    case "create":
      return { action: "create", fields: decodeParameters(FieldsParamsSchema, bag, "create").Fields };
    case "update":
      return {
        action: "update",
        key: key(),
        fields: decodeParameters(FieldsParamsSchema, bag, "update").Fields,
      };
    case "comment":
      return { action: "comment", key: key(), body: decodeParameters(CommentParamsSchema, bag, "comment").Body };
    case "comments":
      return { action: "comments", key: key() };
    case "assign":
      return {
        action: "assign",
        key: key(),
        assignee: decodeParameters(AssignParamsSchema, bag, "assign").Assignee,
      };
    default:
      throw new UnsupportedActionError(
        action,
        JIRA_ACTIONS.map((entry) => entry.name)
      );
  }
}
