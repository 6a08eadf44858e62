/**
 * Status transitions derived from an issue change log
 */

import { z } from "zod";

export interface StatusTransition {
  date: string;
  author: string | null;
  fromStatus: string | null;
  toStatus: string | null;
  /**
   * Heuristic: the first issue comment created in the same second as the change entry.
   * It can belong to an unrelated edit made at that moment.
   */
  comment?: string;
}

export interface IssueHistory {
  key: string;
  status: string | null;
  transitions: StatusTransition[];
}

const UserSchema = z
  .object({
    displayName: z.string().optional(),
    name: z.string().optional(),
    accountId: z.string().optional(),
  })
  .passthrough();

const CommentSchema = z
  .object({
    created: z.string(),
    body: z.unknown().optional(),
  })
  .passthrough();

const HistorySchema = z
  .object({
    created: z.string(),
    author: UserSchema.optional(),
    // Items carry a "toString" key, so they are read as own properties rather than through a shape
    items: z.array(z.record(z.string(), z.unknown())).default([]),
  })
  .passthrough();

export const ChangelogIssueSchema = z
  .object({
    key: z.string(),
    fields: z
      .object({
        status: z.object({ name: z.string() }).passthrough().optional(),
        comment: z
          .object({ comments: z.array(CommentSchema).default([]) })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
    changelog: z
      .object({ histories: z.array(HistorySchema).default([]) })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ChangelogIssue = z.output<typeof ChangelogIssueSchema>;

function ownString(record: Record<string, unknown>, key: string): string | null {
  if (!Object.hasOwn(record, key)) {
    return null;
  }
  const value = record[key];
  return typeof value === "string" ? value : null;
}

function authorName(author: z.output<typeof UserSchema> | undefined): string | null {
  return author?.displayName ?? author?.name ?? author?.accountId ?? null;
}

function sameSecond(a: string, b: string): boolean {
  return a.slice(0, 19) === b.slice(0, 19);
}

/**
 * One record per change-log item whose field is "status", in change-log order
 */
export function extractStatusTransitions(issue: ChangelogIssue): StatusTransition[] {
  const comments = issue.fields?.comment?.comments ?? [];
  const histories = issue.changelog?.histories ?? [];
  const transitions: StatusTransition[] = [];

  for (const history of histories) {
    const related = comments.find((comment) => sameSecond(comment.created, history.created));
    for (const item of history.items) {
      if (item.field !== "status") {
        continue;
      }
      const transition: StatusTransition = {
        date: history.created,
        author: authorName(history.author),
        fromStatus: ownString(item, "fromString"),
        toStatus: ownString(item, "toString"),
      };
      if (related && typeof related.body === "string") {
        transition.comment = related.body;
      }
      transitions.push(transition);
    }
  }

  return transitions;
}

export function summarizeHistory(issue: ChangelogIssue): IssueHistory {
  return {
    key: issue.key,
    status: issue.fields?.status?.name ?? null,
    transitions: extractStatusTransitions(issue),
  };
}
