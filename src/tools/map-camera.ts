import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadConfig } from "../config.js";
import { DEFAULT_HARDWARE_VERSION, mapDevices } from "../mapper.js";

export function registerMapCameraTool(server: McpServer) {
  server.tool(
    "map_camera",
    "Open the camera app on each device and discover the screen coordinates of its controls. Returns one JSON map per device; controls that could not be found are null.",
    {
      addresses: z
        .array(z.string())
        .min(1)
        .describe("Device addresses, ip:port for TCP/IP devices or an adb serial"),
      hardware_version: z
        .string()
        .optional()
        .describe(`Hardware version recorded in the map. Default: ${DEFAULT_HARDWARE_VERSION}`),
      max_attempts: z
        .number()
        .int()
        .optional()
        .describe("Attempts per control before it is recorded absent. Default: 3"),
      settle_ms: z
        .number()
        .int()
        .optional()
        .describe("Wait after each tap in ms. Default: 800"),
    },
    async ({ addresses, hardware_version, max_attempts, settle_ms }, extra) => {
      const config = loadConfig({ maxAttempts: max_attempts, settleMs: settle_ms });
      const results = await mapDevices(addresses, {
        config,
        hardwareVersion: hardware_version,
        signal: extra.signal,
      });

      const maps = results.map((result) =>
        "error" in result
          ? { address: result.address, error: result.error.message }
          : {
              address: result.address,
              state: result.session.state,
              absent: Object.fromEntries(result.session.failures),
              map: result.session.toOutput(),
            },
      );

      return {
        isError: results.every((r) => "error" in r),
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(maps, null, 2),
          },
        ],
      };
    },
  );
}
