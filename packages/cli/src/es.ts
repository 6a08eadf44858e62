#!/usr/bin/env node

/**
 * es-cli entry point
 */

import { processDeps, runTool } from "./lib/program.js";
import { elasticTool } from "./tools/elastic.js";

process.exitCode = await runTool(elasticTool, process.argv.slice(2), processDeps());
