#!/usr/bin/env node

/**
 * jira-cli entry point
 */

import { processDeps, runTool } from "./lib/program.js";
import { jiraTool } from "./tools/jira.js";

process.exitCode = await runTool(jiraTool, process.argv.slice(2), processDeps());
