import { describe, it, expect } from "vitest";
import { ChangelogIssueSchema, extractStatusTransitions } from "./history.js";

describe("extractStatusTransitions", () => {
  it("should emit one record per status item, in order", () => {
    const issue = ChangelogIssueSchema.parse({
      key: "OPS-1",
      changelog: {
        histories: [
          {
            created: "2024-01-02T09:00:00.000+0000",
            author: { name: "jdoe" },
            items: [
              { field: "assignee", fromString: null, toString: "jdoe" },
              { field: "status", fromString: "Open", toString: "In Progress" },
            ],
          },
          {
            created: "2024-01-03T17:30:00.000+0000",
            items: [{ field: "status", fromString: "In Progress", toString: "Resolved" }],
          },
        ],
      },
    });

    expect(extractStatusTransitions(issue)).toEqual([
      { date: "2024-01-02T09:00:00.000+0000", author: "jdoe", fromStatus: "Open", toStatus: "In Progress" },
      { date: "2024-01-03T17:30:00.000+0000", author: null, fromStatus: "In Progress", toStatus: "Resolved" },
    ]);
  });

  it("should attach a comment created in the same second", () => {
    const issue = ChangelogIssueSchema.parse({
      key: "OPS-2",
      fields: {
        comment: {
          comments: [
            { created: "2024-01-03T17:29:59.000+0000", body: "earlier" },
            { created: "2024-01-03T17:30:00.412+0000", body: "closing, verified on prod" },
          ],
        },
      },
      changelog: {
        histories: [
          {
            created: "2024-01-03T17:30:00.100+0000",
            items: [{ field: "status", fromString: "Open", toString: "Closed" }],
          },
        ],
      },
    });

    expect(extractStatusTransitions(issue)[0]?.comment).toBe("closing, verified on prod");
  });

  it("should return no transitions for an issue without a change log", () => {
    expect(extractStatusTransitions(ChangelogIssueSchema.parse({ key: "OPS-3" }))).toEqual([]);
  });

  it("should not read inherited properties as status names", () => {
    const issue = ChangelogIssueSchema.parse({
      key: "OPS-4",
      changelog: { histories: [{ created: "2024-01-01T00:00:00.000+0000", items: [{ field: "status" }] }] },
    });
    expect(extractStatusTransitions(issue)).toEqual([
      { date: "2024-01-01T00:00:00.000+0000", author: null, fromStatus: null, toStatus: null },
    ]);
  });
});
