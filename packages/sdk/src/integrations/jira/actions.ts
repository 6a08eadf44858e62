/**
 * JIRA REST API v2 actions
 */

import { z } from "zod";
import { AmbiguousMatchError, UnexpectedResponseError } from "../../errors.js";
import { encodeSegment, type RestClient } from "../../transport.js";
import { ChangelogIssueSchema, summarizeHistory, type IssueHistory } from "./history.js";
import type { GetIssueParams, JiraCommand, SearchParams, TransitionParams } from "./schemas.js";

const API = "/rest/api/2";

const TransitionListSchema = z
  .object({
    transitions: z.array(z.object({ id: z.string(), name: z.string() }).passthrough()),
  })
  .passthrough();

export interface TransitionResult {
  key: string;
  transition: { id: string; name: string };
}

function issuePath(key: string, suffix = ""): string {
  return `${API}/issue/${encodeSegment(key)}${suffix}`;
}

export async function serverInfo(client: RestClient): Promise<unknown> {
  return client.call("GET", `${API}/serverInfo`);
}

export async function currentUser(client: RestClient): Promise<unknown> {
  return client.call("GET", `${API}/myself`);
}

export async function listProjects(client: RestClient): Promise<unknown> {
  return client.call("GET", `${API}/project`);
}

/**
 * Fetch one issue. `expand` and `fields` are sent only when asked for.
 */
export async function getIssue(client: RestClient, key: string, params: GetIssueParams = {}): Promise<unknown> {
  const expand = new Set(params.Expand ?? []);
  if (params.IncludeChangelog) {
    expand.add("changelog");
  }
  return client.call("GET", issuePath(key), {
    query: {
      expand: expand.size > 0 ? [...expand].join(",") : undefined,
      fields: params.Fields && params.Fields.length > 0 ? params.Fields.join(",") : undefined,
    },
  });
}

export async function searchIssues(client: RestClient, params: SearchParams): Promise<unknown> {
  return client.call("GET", `${API}/search`, {
    query: {
      jql: params.Jql,
      maxResults: params.MaxResults,
      startAt: params.StartAt,
      fields: params.Fields && params.Fields.length > 0 ? params.Fields.join(",") : undefined,
    },
  });
}

/**
 * Fetch the issue with its full change log and derive its status transitions
 */
export async function issueHistory(client: RestClient, key: string): Promise<IssueHistory> {
  const raw = await client.call("GET", issuePath(key), { query: { expand: "changelog" } });
  const parsed = ChangelogIssueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(`${client.baseUrl}${issuePath(key)}`, "expected an issue with a change log");
  }
  return summarizeHistory(parsed.data);
}

export async function listTransitions(client: RestClient, key: string): Promise<unknown> {
  return client.call("GET", issuePath(key, "/transitions"));
}

/**
 * Resolve a transition by exact, case-sensitive name and submit it
 */
export async function transitionIssue(
  client: RestClient,
  key: string,
  params: TransitionParams
): Promise<TransitionResult> {
  const raw = await listTransitions(client, key);
  const parsed = TransitionListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(
      `${client.baseUrl}${issuePath(key, "/transitions")}`,
      "expected a transitions list"
    );
  }

  const available = parsed.data.transitions;
  const match = available.find((transition) => transition.name === params.Transition);
  if (!match) {
    throw new AmbiguousMatchError(
      params.Transition,
      available.map((transition) => transition.name)
    );
  }

  const body: Record<string, unknown> = { transition: { id: match.id } };
  if (params.Comment !== undefined) {
    body.update = { comment: [{ add: { body: params.Comment } }] };
  }
  await client.call("POST", issuePath(key, "/transitions"), { body });

  return { key, transition: { id: match.id, name: match.name } };
}

export async function createIssue(client: RestClient, fields: Record<string, unknown>): Promise<unknown> {
  return client.call("POST", `${API}/issue`, { body: { fields } });
}

export async function updateIssue(
  client: RestClient,
  key: string,
  fields: Record<string, unknown>
): Promise<unknown> {
  return client.call("PUT", issuePath(key), { body: { fields } });
}

export async function addComment(client: RestClient, key: string, body: string): Promise<unknown> {
  return client.call("POST", issuePath(key, "/comment"), { body: { body } });
}

export async function listComments(client: RestClient, key: string): Promise<unknown> {
  return client.call("GET", issuePath(key, "/comment"));
}

export async function assignIssue(client: RestClient, key: string, assignee: string): Promise<unknown> {
  return client.call("PUT", issuePath(key, "/assignee"), { body: { name: assignee } });
}

export async function executeJiraCommand(client: RestClient, command: JiraCommand): Promise<unknown> {
  switch (command.action) {
    case "serverinfo":
      return serverInfo(client);
    case "myself":
      return currentUser(client);
    case "projects":
      return listProjects(client);
    case "get":
      return getIssue(client, command.key, command.params);
    case "search":
      return searchIssues(client, command.params);
    case "history":
      return issueHistory(client, command.key);
    case "transitions":
      return listTransitions(client, command.key);
    case "transition":
      return transitionIssue(client, command.key, command.params);
    case "create":
      return createIssue(client, command.fields);
    case "update":
      return updateIssue(client, command.key, command.fields);
    case "comment":
      return addComment(client, command.key, command.body);
    case "comments":
      return listComments(client, command.key);
    case "assign":
      return assignIssue(client, command.key, command.assignee);
  }
}
