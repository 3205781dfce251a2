import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatPath, MATCH_MODES } from "../extractor";
import { listSceneFiles } from "../scenes/sceneFiles";
import { extractChunkData, resolveScenePath } from "../tools/chunkDataTools";
import type { AppEnv } from "../utils/envHandler";


export function registerSceneTools(server: McpServer, env: AppEnv): void {
  server.registerTool(
    "list-scene-files",
    {
      title: "list-scene-files",
      description: "List the OBS scene collection files in the scenes folder.",
      inputSchema: {
        scenesDir: z.string().optional().describe("Folder to list. Defaults to the configured OBS scenes folder."),
      },
      outputSchema: {
        files: z.array(z.object({
          name: z.string().describe("File name of the scene collection."),
          path: z.string().describe("Absolute path of the scene collection."),
        })),
      }
    },
    async (args: { scenesDir?: string }) => {
      const files = await listSceneFiles(args.scenesDir ?? env.scenesDir);
      return {
        content: [{
          type: "text",
          text: JSON.stringify(files, null, 0)
        }],
        structuredContent: { files }
      };
    }
  );

  server.registerTool(
    "extract-chunk-data",
    {
      title: "extract-chunk-data",
      description: "Find the chunk data of a plugin filter (ReaFIR by default) in an OBS scene collection.",
      inputSchema: {
        file: z.string().describe("Scene collection file name (looked up in the scenes folder) or path."),
        pluginField: z.string().optional().describe("Field identifying the plugin, e.g. plugin_path."),
        pluginSignature: z.string().optional().describe("Value of the identifying field, e.g. reafir_standalone.dll."),
        match: z.enum(["equals", "endsWith"]).optional().describe(`How the identifying field is compared: ${MATCH_MODES.join(" or ")}.`),
        payloadKey: z.string().optional().describe("Field holding the payload, e.g. chunk_data."),
        maxDepth: z.number().int().gte(1).optional().describe("Maximum nesting depth accepted in the file."),
      },
      outputSchema: {
        file: z.string().describe("Path of the file that was searched."),
        matches: z.array(z.object({
          path: z.string().describe("Location of the matching filter entry."),
          payload: z.string().describe("The extracted payload."),
        })),
      }
    },
    async (args: { file: string, pluginField?: string, pluginSignature?: string, match?: "equals" | "endsWith", payloadKey?: string, maxDepth?: number }) => {
      const filePath = resolveScenePath(args.file, env.scenesDir);
      const res = await extractChunkData(filePath, {
        pluginField: args.pluginField ?? env.pluginField,
        pluginSignature: args.pluginSignature ?? env.pluginSignature,
        match: args.match ?? env.match,
        payloadKey: args.payloadKey ?? env.payloadKey,
        maxDepth: args.maxDepth ?? env.maxDepth,
      });
      const structured = {
        file: res.file,
        matches: res.matches.map((m) => ({ path: formatPath(m.path), payload: m.payload })),
      };
      return {
        content: [{
          type: "text",
          text: JSON.stringify(structured, null, 0)
        }],
        structuredContent: structured
      };
    }
  );
}
