#!/usr/bin/env node

/**
 * aircraft-event-mapper — MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { executeClassifyEvents } from "./tools/classify.js";
import { classifyEventsSchema } from "./schemas/classify.js";
import { executeGenerateDefinitions, formatGenerateResult } from "./tools/generate.js";
import { generateDefinitionsSchema } from "./schemas/generate.js";
import { executeCheckCoverage, formatCoverageResult } from "./tools/coverage.js";
import { checkCoverageSchema } from "./schemas/coverage.js";

const server = new McpServer({
  name: "aircraft-event-mapper",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tool: classify_events
// ---------------------------------------------------------------------------

server.tool(
  "classify_events",
  "Classify aircraft event names into controls (button, switch, wheel, ground button, standalone) " +
    "and show the base identifier and role each event gets.",
  classifyEventsSchema,
  async ({ events }) => {
    try {
      const result = executeClassifyEvents(events);
      return { content: [{ type: "text", text: result }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error classifying events: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: generate_definitions
// ---------------------------------------------------------------------------

server.tool(
  "generate_definitions",
  "Generate simulator definition YAML from a category event list. " +
    "Button pairs with a boolean variable become ToggleSwitch entries, wheels with a numeric variable " +
    "become NumIncrement entries, everything else becomes plain events. " +
    "Per-event overrides (type, unreliable, use_calculator, add_by, multiply_by, increment_by, cancel_h_events) win over inferred values. " +
    "The complete YAML is ALWAYS returned in the response.",
  generateDefinitionsSchema,
  async ({ source, variables, description, variablePrefix, outputPath }) => {
    try {
      const config = await loadConfig();
      const result = await executeGenerateDefinitions(
        { source, variables, description, variablePrefix, outputPath },
        config,
      );
      const text = formatGenerateResult(result);
      return { content: [{ type: "text", text }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error generating definitions: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: check_coverage
// ---------------------------------------------------------------------------

server.tool(
  "check_coverage",
  "Check which events of a category checklist already appear in generated definition files. " +
    "Reports found/total, the coverage percentage and the missing events; " +
    "optionally marks found events in the checklist file.",
  checkCoverageSchema,
  async ({ checklist, corpus, markPresent }) => {
    try {
      const result = await executeCheckCoverage({ checklist, corpus, markPresent });
      return { content: [{ type: "text", text: formatCoverageResult(result) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error checking coverage: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
