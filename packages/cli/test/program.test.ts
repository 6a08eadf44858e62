/**
 * End-to-end tests of the three tools, run in-process against a stub fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  captureStream,
  createScriptedPrompter,
  createStubFetch,
  type CapturedStream,
  type ScriptedPrompter,
  type StubFetch,
  type StubResponse,
} from "@opsbridge/testkit";
import { runTool, type CliDeps } from "../src/lib/program.js";
import { elasticTool } from "../src/tools/elastic.js";
import { hubspotTool } from "../src/tools/hubspot.js";
import { jiraTool } from "../src/tools/jira.js";

const ES_ENV = { ES_USERNAME: "elastic", ES_PASSWORD: "test-secret" };
const JIRA_ENV = { JIRA_USERNAME: "svc-user", JIRA_API_TOKEN: "test-secret" };
const HUBSPOT_ENV = { HUBSPOT_ACCESS_TOKEN: "test-token" };

interface Harness {
  deps: CliDeps;
  stub: StubFetch;
  stdout: CapturedStream;
  stderr: CapturedStream;
}

function harness(
  env: Record<string, string>,
  responses: StubResponse[] = [],
  extra: { prompter?: ScriptedPrompter; stdin?: string } = {}
): Harness {
  const stub = createStubFetch(responses);
  const stdout = captureStream();
  const stderr = captureStream();
  const deps: CliDeps = { env, stdout, stderr, fetchFn: stub.fetch };
  if (extra.prompter) {
    deps.prompter = extra.prompter;
  }
  const stdin = extra.stdin;
  if (stdin !== undefined) {
    deps.readStdin = async () => stdin;
  }
  return { deps, stub, stdout, stderr };
}

describe("runTool", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("usage", () => {
    it("should print usage and exit 0 without an action", async () => {
      const { deps, stub, stdout } = harness({});
      await expect(runTool(elasticTool, [], deps)).resolves.toBe(0);
      expect(stdout.text()).toContain("Usage: es-cli <action> [index]");
      expect(stub.requests).toHaveLength(0);
    });

    it("should treat help as a request for usage", async () => {
      const { deps, stdout } = harness({});
      await expect(runTool(jiraTool, ["help"], deps)).resolves.toBe(0);
      expect(stdout.text()).toContain("Usage: jira-cli <action> [issueKey]");
    });

    it("should print commander help with the action list for --help", async () => {
      const { deps, stdout } = harness({});
      await expect(runTool(hubspotTool, ["--help"], deps)).resolves.toBe(0);
      expect(stdout.text()).toContain("--params-file <path>");
      expect(stdout.text()).toContain("Actions:");
    });

    it("should reject unknown actions with usage on stderr", async () => {
      const { deps, stub, stdout, stderr } = harness(ES_ENV);
      await expect(runTool(elasticTool, ["reindex", "logs"], deps)).resolves.toBe(1);
      expect(stderr.text().split("\n")[0]).toBe(
        'Error: Unsupported action "reindex". Supported actions: health, indices, mapping, search, count, stats, get, create, update, delete'
      );
      expect(stderr.text()).toContain("Usage: es-cli");
      expect(stdout.text()).toBe("");
      expect(stub.requests).toHaveLength(0);
    });

    it("should reject unknown options", async () => {
      const { deps, stderr } = harness(ES_ENV);
      await expect(runTool(elasticTool, ["health", "--bogus"], deps)).resolves.toBe(1);
      expect(stderr.text()).toContain("unknown option '--bogus'");
    });
  });

  describe("validation happens before any request", () => {
    it("should exit 1 when the primary key is missing", async () => {
      const { deps, stub, stderr } = harness(ES_ENV);
      await expect(runTool(elasticTool, ["search"], deps)).resolves.toBe(1);
      expect(stderr.text().split("\n")[0]).toBe('Error: Missing required parameter "index" for action "search"');
      expect(stub.requests).toHaveLength(0);
    });

    it("should exit 1 for an unsupported object type", async () => {
      const { deps, stub } = harness(HUBSPOT_ENV);
      await expect(runTool(hubspotTool, ["list", "widgets"], deps)).resolves.toBe(1);
      expect(stub.requests).toHaveLength(0);
    });

    it("should exit 1 when --json is not an object", async () => {
      const { deps, stderr } = harness(ES_ENV);
      await expect(runTool(elasticTool, ["search", "logs", "--json", "[1]"], deps)).resolves.toBe(1);
      expect(stderr.text()).toBe('Error: Invalid parameter "--json" for action "*": expected a JSON object\n');
    });
  });

  describe("credentials", () => {
    it("should exit 2 without calling the service when the prompt is left empty", async () => {
      const prompter = createScriptedPrompter({ visible: [""] });
      const { deps, stub, stderr } = harness({}, [], { prompter });

      await expect(runTool(elasticTool, ["health"], deps)).resolves.toBe(2);

      expect(prompter.asked).toEqual(["Elasticsearch ES_USERNAME: "]);
      expect(stderr.text()).toBe(
        "Error: Missing Elasticsearch credential: set ES_USERNAME or enter it when prompted\n"
      );
      expect(stub.requests).toHaveLength(0);
    });

    it("should exit 2 when no terminal is available", async () => {
      const { deps, stub } = harness({});
      await expect(runTool(hubspotTool, ["owners"], deps)).resolves.toBe(2);
      expect(stub.requests).toHaveLength(0);
    });

    it("should use prompted values", async () => {
      const prompter = createScriptedPrompter({ secret: ["test-secret"] });
      const { deps, stub } = harness({ ES_USERNAME: "elastic" }, [{ body: { status: "green" } }], { prompter });

      await expect(runTool(elasticTool, ["health"], deps)).resolves.toBe(0);
      expect(stub.requests[0]?.headers.authorization).toBe("Basic ZWxhc3RpYzp0ZXN0LXNlY3JldA==");
    });
  });

  describe("elasticsearch", () => {
    it("should search with defaults and print the response", async () => {
      const response = { hits: { total: { value: 1 }, hits: [{ _id: "a" }] } };
      const { deps, stub, stdout } = harness(ES_ENV, [{ body: response }]);

      await expect(runTool(elasticTool, ["search", "test-logs-*"], deps)).resolves.toBe(0);

      expect(stub.requests).toHaveLength(1);
      expect(stub.requests[0]?.method).toBe("POST");
      expect(stub.requests[0]?.url).toBe("http://localhost:9200/test-logs-*/_search");
      expect(stub.requests[0]?.body).toEqual({ query: { match_all: {} }, size: 100, from: 0 });
      expect(stdout.text()).toBe(JSON.stringify(response, null, 2) + "\n");
    });

    it("should let --json override --param on collision", async () => {
      const { deps, stub } = harness(ES_ENV);
      await runTool(elasticTool, ["search", "logs", "-p", "Size=10", "-p", "From=5", "--json", '{"Size":20}'], deps);
      expect(stub.requests[0]?.body).toEqual({ query: { match_all: {} }, size: 20, from: 5 });
    });

    it("should read --json from stdin when given -", async () => {
      const { deps, stub } = harness(ES_ENV, [], { stdin: '{"Query":{"term":{"level":"error"}}}' });
      await runTool(elasticTool, ["count", "logs", "--json", "-"], deps);
      expect(stub.requests[0]?.body).toEqual({ query: { term: { level: "error" } } });
    });

    it("should honor --base-url and --raw", async () => {
      const { deps, stub, stdout } = harness({ ...ES_ENV, ES_BASE_URL: "http://es.internal:9200" }, [
        { body: { status: "green" } },
      ]);
      await runTool(elasticTool, ["health", "--base-url", "https://search.example.com/", "--raw"], deps);
      expect(stub.requests[0]?.url).toBe("https://search.example.com/_cluster/health");
      expect(stdout.text()).toBe('{"status":"green"}\n');
    });

    it("should exit 3 with the response body on an HTTP error", async () => {
      const { deps, stderr, stdout } = harness(ES_ENV, [{ status: 404, text: '{"error":"index_not_found"}' }]);

      await expect(runTool(elasticTool, ["mapping", "missing-index"], deps)).resolves.toBe(3);

      expect(stderr.text()).toBe(
        "Error: GET http://localhost:9200/missing-index/_mapping failed with HTTP 404\n" +
          '  Response: {"error":"index_not_found"}\n'
      );
      expect(stdout.text()).toBe("");
    });

    it("should reject a null page size without sending a request", async () => {
      const { deps, stub, stderr } = harness(ES_ENV);
      await expect(runTool(elasticTool, ["search", "logs", "--json", '{"Size":null}'], deps)).resolves.toBe(1);
      expect(stderr.text()).toMatch(/^Error: Invalid parameter "Size" for action "search"/);
      expect(stub.requests).toHaveLength(0);
    });

    it("should report timing on stderr when OPSBRIDGE_CLI_DEBUG=1", async () => {
      const { deps, stdout, stderr } = harness({ ...ES_ENV, OPSBRIDGE_CLI_DEBUG: "1" }, [
        { body: { status: "green" } },
      ]);

      await expect(runTool(elasticTool, ["health", "--raw"], deps)).resolves.toBe(0);

      expect(stdout.text()).toBe('{"status":"green"}\n');
      expect(stderr.text()).toMatch(/^metric es-cli\.health duration_ms=\d+ success=true\n$/);
    });

    describe("params file", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "opsbridge-cli-"));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it("should read parameters from a file, with --param taking precedence", async () => {
        const file = join(dir, "params.json");
        await writeFile(file, JSON.stringify({ Size: 3, From: 9 }), "utf8");
        const { deps, stub } = harness(ES_ENV);

        await runTool(elasticTool, ["search", "logs", "--params-file", file, "-p", "From=1"], deps);

        expect(stub.requests[0]?.body).toEqual({ query: { match_all: {} }, size: 3, from: 1 });
      });
    });
  });

  describe("jira", () => {
    it("should fetch an issue", async () => {
      const { deps, stub } = harness(JIRA_ENV, [{ body: { key: "MS-123" } }]);
      await expect(runTool(jiraTool, ["get", "MS-123"], deps)).resolves.toBe(0);
      expect(stub.requests[0]?.url).toBe("https://jira.example.com/rest/api/2/issue/MS-123");
    });

    it("should exit 1 and list available transitions when the name does not match", async () => {
      const { deps, stub, stderr } = harness(JIRA_ENV, [
        { body: { transitions: [{ id: "11", name: "Start Progress" }] } },
      ]);

      await expect(runTool(jiraTool, ["transition", "OPS-1", "-p", "Transition=Done"], deps)).resolves.toBe(1);

      expect(stderr.text()).toBe('Error: No transition named "Done". Available transitions: Start Progress\n');
      expect(stub.requests).toHaveLength(1);
    });
  });

  describe("jira text parameters", () => {
    it("should assign to a user whose name is all digits", async () => {
      const { deps, stub } = harness(JIRA_ENV, [{ status: 204 }]);

      await expect(runTool(jiraTool, ["assign", "OPS-1", "-p", "Assignee=10042"], deps)).resolves.toBe(0);

      expect(stub.requests).toHaveLength(1);
      expect(stub.requests[0]?.method).toBe("PUT");
      expect(stub.requests[0]?.url).toBe("https://jira.example.com/rest/api/2/issue/OPS-1/assignee");
      expect(stub.requests[0]?.body).toEqual({ name: "10042" });
    });

    it("should resolve a transition with a numeric name and keep a boolean-looking comment as text", async () => {
      const { deps, stub } = harness(JIRA_ENV, [
        { body: { transitions: [{ id: "31", name: "2" }] } },
        { status: 204 },
      ]);

      await expect(
        runTool(jiraTool, ["transition", "OPS-1", "-p", "Transition=2", "-p", "Comment=true"], deps)
      ).resolves.toBe(0);

      expect(stub.requests).toHaveLength(2);
      expect(stub.requests[1]?.body).toEqual({
        transition: { id: "31" },
        update: { comment: [{ add: { body: "true" } }] },
      });
    });
  });

  describe("hubspot", () => {
    it("should update a deal", async () => {
      const { deps, stub } = harness(HUBSPOT_ENV, [{ body: { id: "123456" } }]);

      await expect(
        runTool(
          hubspotTool,
          ["update", "deal", "-p", "Id=123456", "--json", '{"Properties":{"dealstage":"decisionmakerboughtin"}}'],
          deps
        )
      ).resolves.toBe(0);

      expect(stub.requests).toHaveLength(1);
      expect(stub.requests[0]?.method).toBe("PATCH");
      expect(stub.requests[0]?.url).toBe("https://api.hubapi.com/crm/v3/objects/deals/123456");
      expect(stub.requests[0]?.body).toEqual({ properties: { dealstage: "decisionmakerboughtin" } });
    });

    it("should keep a record id beyond the safe integer range intact", async () => {
      const { deps, stub } = harness(HUBSPOT_ENV, [{ status: 204 }]);

      await expect(runTool(hubspotTool, ["delete", "deals", "-p", "Id=12345678901234567891"], deps)).resolves.toBe(0);

      expect(stub.requests[0]?.method).toBe("DELETE");
      expect(stub.requests[0]?.url).toBe("https://api.hubapi.com/crm/v3/objects/deals/12345678901234567891");
    });

    it("should reject an unsafe numeric id given through --json", async () => {
      const { deps, stub, stderr } = harness(HUBSPOT_ENV);

      await expect(
        runTool(hubspotTool, ["delete", "deals", "--json", '{"Id":12345678901234567891}'], deps)
      ).resolves.toBe(1);

      expect(stderr.text()).toMatch(/^Error: Invalid parameter "Id" for action "delete"/);
      expect(stub.requests).toHaveLength(0);
    });

    it("should require an alternate key or id for get", async () => {
      const { deps, stub, stderr } = harness(HUBSPOT_ENV);
      await expect(runTool(hubspotTool, ["get", "contacts"], deps)).resolves.toBe(1);
      expect(stderr.text()).toBe('Error: Missing required parameter "Id or Email" for action "get"\n');
      expect(stub.requests).toHaveLength(0);
    });
  });
});
