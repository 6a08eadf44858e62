/**
 * Shared command-line dispatcher for the three tools
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
  MissingPrimaryKeyError,
  UnsupportedActionError,
  UnsupportedObjectTypeError,
  createRestClient,
  logger,
  mergeParameterBags,
  resolveCredentials,
  type ParameterBag,
  type Prompter,
} from "@opsbridge/sdk";
import { parseNonNegativeInt, parseParamEntry } from "./arg.js";
import { isVerbose, resolveBaseUrl, resolveTimeoutMs, type Environment } from "./env.js";
import { formatCliError, mapErrorToExitCode } from "./errors.js";
import { isStdinTTY, readParamsFile, readStdin } from "./io.js";
import { createTerminalPrompter } from "./prompt.js";
import { colorize, printJson, type Writer } from "./render.js";
import { withTiming } from "./telemetry.js";
import type { ToolDefinition } from "./tool.js";
import { renderUsage } from "./usage.js";

const PackageJsonSchema = z.object({ version: z.string() });

// src/lib and dist/lib both sit two levels below the package root
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"))
);

export interface CliDeps {
  env: Environment;
  stdout: Writer & { isTTY?: boolean };
  stderr: Writer & { isTTY?: boolean };
  fetchFn?: typeof fetch;
  /** Absent when no terminal is attached */
  prompter?: Prompter;
  readStdin?: () => Promise<string>;
}

type CliOptions = {
  param: ParameterBag;
  paramsFile?: string;
  json?: string;
  baseUrl?: string;
  timeout?: number;
  raw?: boolean;
  verbose?: boolean;
};

interface Invocation {
  action?: string;
  key?: string;
  options: CliOptions;
}

const NO_PARAMS: ParameterBag = {};

function createProgram<C extends { action: string }>(
  tool: ToolDefinition<C>,
  deps: CliDeps,
  captured: { invocation?: Invocation }
): Command {
  const program = new Command();

  program
    .name(tool.bin)
    .description(tool.description)
    .version(packageJson.version)
    .argument("[action]", "action to run")
    .argument(`[${tool.keyLabel}]`, `${tool.keyLabel} the action applies to`)
    .option(
      "-p, --param <Key=Value>",
      "action parameter, repeatable; the value is read as JSON when it parses",
      parseParamEntry,
      NO_PARAMS
    )
    .option("--params-file <path>", "read action parameters from a JSON file")
    .option("--json <text>", "action parameters as a JSON object, '-' reads stdin")
    .option("--base-url <url>", `override ${tool.service.baseUrlEnv}`)
    .option("--timeout <ms>", "request timeout in milliseconds, 0 disables it", (value: string) =>
      parseNonNegativeInt(value, "--timeout", 600_000)
    )
    .option("--raw", "print compact JSON")
    .option("--verbose", "debug logging and error causes")
    .addHelpText("after", "\n" + renderUsage(tool))
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
      outputError: (str, write) => write(colorize(str, "red", deps.stderr)),
    })
    .exitOverride()
    .action((action: string | undefined, key: string | undefined) => {
      captured.invocation = { action, key, options: program.opts<CliOptions>() };
    });

  return program;
}

async function collectParameters(options: CliOptions, deps: CliDeps): Promise<ParameterBag> {
  const fromFile = options.paramsFile ? await readParamsFile(options.paramsFile) : {};
  const structured = { ...fromFile, ...options.param };
  const jsonText = options.json === "-" ? await (deps.readStdin ?? readStdin)() : options.json;
  return mergeParameterBags(structured, jsonText);
}

/**
 * Run one tool invocation and return its exit code
 */
export async function runTool<C extends { action: string }>(
  tool: ToolDefinition<C>,
  argv: readonly string[],
  deps: CliDeps
): Promise<number> {
  const captured: { invocation?: Invocation } = {};
  const program = createProgram(tool, deps, captured);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const invocation = captured.invocation;
  const action = invocation?.action?.trim();
  if (!invocation || !action || action.toLowerCase() === "help") {
    deps.stdout.write(renderUsage(tool));
    return 0;
  }

  const { options } = invocation;
  const verbose = options.verbose ?? isVerbose(deps.env);
  if (options.verbose) {
    logger.setLevel("debug");
  }

  try {
    const bag = await collectParameters(options, deps);
    const command = tool.decode(action, invocation.key, bag);
    const baseUrl = resolveBaseUrl(tool.service, options.baseUrl, deps.env);
    const timeoutMs = resolveTimeoutMs(options.timeout, deps.env);
    const credentials = await resolveCredentials(tool.service.credentials, {
      env: deps.env,
      prompter: deps.prompter,
    });

    const client = createRestClient({ baseUrl, credentials, fetchFn: deps.fetchFn, timeoutMs });
    const result = await withTiming(
      `${tool.bin}.${command.action}`,
      () => tool.execute(client, command),
      { env: deps.env, out: deps.stderr }
    );

    printJson(result, { raw: options.raw }, deps.stdout);
    return 0;
  } catch (err) {
    deps.stderr.write(`${colorize("Error:", "red", deps.stderr)} ${formatCliError(err, verbose)}\n`);
    if (
      err instanceof UnsupportedActionError ||
      err instanceof UnsupportedObjectTypeError ||
      err instanceof MissingPrimaryKeyError
    ) {
      deps.stderr.write("\n" + renderUsage(tool));
    }
    return mapErrorToExitCode(err);
  }
}

/**
 * Process-level dependencies for the bin entry points
 */
export function processDeps(): CliDeps {
  return {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    ...(isStdinTTY() ? { prompter: createTerminalPrompter() } : {}),
  };
}
