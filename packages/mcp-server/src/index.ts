#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Orchestrator, loadSettings } from "@pillar-decision/agents";
import { registerScenarioTools } from "./tools/scenario.js";

const settings = loadSettings();
const orchestrator = new Orchestrator({ settings });

const server = new McpServer({
  name: "pillar-decision-mcp",
  version: "0.1.0",
});

registerScenarioTools(server, { orchestrator, weightTolerance: settings.weightTolerance });

const transport = new StdioServerTransport();
await server.connect(transport);
