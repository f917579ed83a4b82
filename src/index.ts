#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { registerListDevicesTool } from "./tools/list-devices.js";
import { registerMapCameraTool } from "./tools/map-camera.js";

const server = new McpServer({
  name: "camera-mapper",
  version: "1.0.0",
});

registerListDevicesTool(server);
registerMapCameraTool(server);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("camera-mapper server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
