/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  AmbiguousMatchError,
  ApiError,
  InvalidParameterError,
  MissingCredentialError,
  MissingPrimaryKeyError,
  UnsupportedActionError,
} from "@opsbridge/sdk";
import { formatCliError, mapErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("mapErrorToExitCode", () => {
    it("should map usage and validation errors to 1", () => {
      expect(mapErrorToExitCode(new UnsupportedActionError("x", ["get"]))).toBe(1);
      expect(mapErrorToExitCode(new MissingPrimaryKeyError("index", "search"))).toBe(1);
      expect(mapErrorToExitCode(new InvalidParameterError("Size", "search", "bad"))).toBe(1);
      expect(mapErrorToExitCode(new AmbiguousMatchError("Done", []))).toBe(1);
    });

    it("should map missing credentials to 2", () => {
      expect(mapErrorToExitCode(new MissingCredentialError("JIRA", "JIRA_API_TOKEN"))).toBe(2);
    });

    it("should map API errors to 3", () => {
      expect(mapErrorToExitCode(new ApiError({ method: "GET", uri: "http://x.test/", statusCode: 500 }))).toBe(3);
    });

    it("should keep commander exit codes", () => {
      expect(mapErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
      expect(mapErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should append the raw response body of API errors", () => {
      const err = new ApiError({
        method: "POST",
        uri: "http://localhost:9200/logs/_search",
        statusCode: 400,
        rawBody: '{"error":"parsing_exception"}',
      });
      expect(formatCliError(err)).toBe(
        'POST http://localhost:9200/logs/_search failed with HTTP 400\n  Response: {"error":"parsing_exception"}'
      );
    });

    it("should include cause and stack in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);
      expect(formatted).toContain("\n  Cause: Error: underlying");
      expect(formatted).toContain("Error: wrapper");
    });

    it("should not include stack in non-verbose mode", () => {
      expect(formatCliError(new Error("test"), false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
