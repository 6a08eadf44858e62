/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { elastic, jira } from "@opsbridge/sdk";
import { isVerbose, resolveBaseUrl, resolveTimeoutMs } from "../src/lib/env.js";

describe("environment resolution", () => {
  describe("resolveBaseUrl", () => {
    it("should use CLI option when provided", () => {
      const env = { JIRA_BASE_URL: "https://env.example.com" };
      expect(resolveBaseUrl(jira.JIRA_SERVICE, "https://cli.example.com/", env)).toBe("https://cli.example.com");
    });

    it("should use the service env var when CLI option not provided", () => {
      expect(resolveBaseUrl(jira.JIRA_SERVICE, undefined, { JIRA_BASE_URL: "https://env.example.com" })).toBe(
        "https://env.example.com"
      );
    });

    it("should use the built-in default when neither provided", () => {
      expect(resolveBaseUrl(elastic.ELASTIC_SERVICE, undefined, {})).toBe("http://localhost:9200");
    });

    it("should reject malformed URLs", () => {
      expect(() => resolveBaseUrl(elastic.ELASTIC_SERVICE, "not a url", {})).toThrow(InvalidArgumentError);
      expect(() => resolveBaseUrl(elastic.ELASTIC_SERVICE, "ftp://files.example.com", {})).toThrow(
        "must use http or https"
      );
    });
  });

  describe("resolveTimeoutMs", () => {
    it("should prefer the CLI option", () => {
      expect(resolveTimeoutMs(500, { OPSBRIDGE_TIMEOUT_MS: "9000" })).toBe(500);
    });

    it("should read OPSBRIDGE_TIMEOUT_MS", () => {
      expect(resolveTimeoutMs(undefined, { OPSBRIDGE_TIMEOUT_MS: "9000" })).toBe(9000);
    });

    it("should leave the transport default in place when unset", () => {
      expect(resolveTimeoutMs(undefined, {})).toBeUndefined();
    });

    it("should reject non-numeric values", () => {
      expect(() => resolveTimeoutMs(undefined, { OPSBRIDGE_TIMEOUT_MS: "soon" })).toThrow(
        'OPSBRIDGE_TIMEOUT_MS must be a non-negative integer, got "soon"'
      );
    });
  });

  describe("isVerbose", () => {
    it("should be true only when OPSBRIDGE_CLI_DEBUG=1", () => {
      expect(isVerbose({ OPSBRIDGE_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ OPSBRIDGE_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
