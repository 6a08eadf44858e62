#!/usr/bin/env node

/**
 * hubspot-cli entry point
 */

import { processDeps, runTool } from "./lib/program.js";
import { hubspotTool } from "./tools/hubspot.js";

process.exitCode = await runTool(hubspotTool, process.argv.slice(2), processDeps());
