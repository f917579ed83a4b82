import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { adbSettingsFrom, loadConfig } from "../config.js";
import * as android from "../platforms/android.js";

export function registerListDevicesTool(server: McpServer) {
  server.tool(
    "list_devices",
    "List Android devices known to adb, with their connection status",
    {},
    async () => {
      try {
        const devices = await android.listDevices(adbSettingsFrom(loadConfig()));
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(devices, null, 2),
            },
          ],
        };
      } catch (e) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `adb error: ${e instanceof Error ? e.message : String(e)}`,
            },
          ],
        };
      }
    },
  );
}
