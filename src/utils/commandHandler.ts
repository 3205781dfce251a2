import os from "node:os";
import yargsFactory from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import yargs from "yargs";

import { MATCH_MODES } from "../extractor";
import { startMcpServer } from "../server/server";
import { runExtract, runListScenes } from "../tools/cliTools";
import { formatDuration } from "./duration";
import { AppEnv, EnvHandler } from "./envHandler";
import { getLogger, LOG_LEVELS, setupLogging } from "./logger";

export const SCRIPT_NAME = "scene-chunk";
export const VERSION = "1.0.0";

const log = getLogger(SCRIPT_NAME);

export class CommandHandler {
  private static instance: CommandHandler | null = null;

  private constructor() {}

  static getHandler(): CommandHandler {
    if (!CommandHandler.instance) {
      CommandHandler.instance = new CommandHandler();
    }
    return CommandHandler.instance;
  }

  private async initLogging(env: AppEnv): Promise<string> {
    const host = os.hostname();
    await setupLogging({
      scriptName: SCRIPT_NAME,
      host,
      consoleLevel: env.logLevel,
      fileLevel: env.fileLogLevel,
      logDir: env.logDir,
      maxFolderBytes: env.logMaxFolderBytes,
    });
    return host;
  }

  private async runTimed(env: AppEnv, task: () => Promise<unknown>): Promise<void> {
    const host = await this.initLogging(env);
    const start = process.hrtime.bigint();
    log.info(`Script: "${SCRIPT_NAME}" | Version: ${VERSION} | Host: "${host}"`);
    await task();
    log.info(`Execution completed in ${formatDuration(process.hrtime.bigint() - start)}.`);
  }

  async getCommandCallback(args: yargs.ArgumentsCamelCase): Promise<() => Promise<void>> {
    const env = EnvHandler.resolveAppEnv(args);
    switch (args.tool) {
      case "list-scenes":
        return async () => {
          await this.runTimed(env, () => runListScenes(env));
        };
      case "serve":
        return async () => {
          await this.initLogging(env);
          await startMcpServer(env);
        };
      case undefined:
        return async () => {
          await this.runTimed(env, () => runExtract(env));
        };
      default:
        throw new Error(`Unknown tool: ${String(args.tool)}`);
    }
  }

  async parseArgs(argv: string[]): Promise<yargs.ArgumentsCamelCase> {
    return await yargsFactory(hideBin(argv))
    .scriptName(SCRIPT_NAME)
    .usage("$0 [options]")
    .option("env", {
      alias: "e",
      type: "string",
      description: "Path to .env file",
    })
    .option("tool", {
      alias: "T",
      type: "string",
      choices: ["list-scenes", "serve"],
      description: "Tool to run (default extracts chunk data)",
    })
    .option("scenes-dir", {
      alias: "s",
      type: "string",
      description: "OBS scenes folder",
    })
    .option("file", {
      alias: "f",
      type: "string",
      description: "Scene collection file name or path",
    })
    .option("plugin-field", {
      type: "string",
      description: "Field identifying the plugin (default plugin_path)",
    })
    .option("plugin-signature", {
      type: "string",
      description: "Value of the identifying field (default reafir_standalone.dll)",
    })
    .option("match", {
      type: "string",
      choices: [...MATCH_MODES],
      description: "How the identifying field is compared",
    })
    .option("payload-key", {
      alias: "k",
      type: "string",
      description: "Field holding the payload (default chunk_data)",
    })
    .option("max-depth", {
      type: "number",
      description: "Maximum nesting depth of the scene file",
    })
    .option("pick", {
      type: "number",
      description: "Match to copy when several are found (1-based)",
    })
    .option("copy", {
      type: "boolean",
      description: "Copy the payload to the clipboard (use --no-copy to disable)",
    })
    .option("print", {
      type: "boolean",
      description: "Print the payload to stdout",
    })
    .option("host", {
      type: "string",
      description: "Host to run the server on",
    })
    .option("port", {
      type: "number",
      description: "Port to run the server on",
    })
    .option("log-level", {
      type: "string",
      choices: [...LOG_LEVELS],
      description: "Console log level",
    })
    .option("log-dir", {
      type: "string",
      description: "Folder for log files (file logging is off when unset)",
    })
    .option("log-max-folder-bytes", {
      type: "number",
      description: "Delete the oldest log files above this total size",
    })
    .example("$0", "Choose a scene collection and copy the ReaFIR chunk data")
    .example("$0 -f Untitled.json --print --no-copy", "Print the chunk data of one collection")
    .example("$0 -T serve --port 3000", "Start MCP server")
    .alias("h", "help")
    .help("help")
    .version(VERSION)
    .strictOptions()
    .showHelpOnFail(true)
    .wrap(process.stdout.columns ?? 120)
    .parse();
  }
}
