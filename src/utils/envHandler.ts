import dotenv from "dotenv";
import fs from "node:fs";
import yargs from "yargs";
import { isMatchMode, MatchMode } from "../extractor";
import { DEFAULT_CHUNK_DATA_QUERY } from "../tools/chunkDataTools";
import { defaultScenesDir } from "../scenes/sceneFiles";
import { isLogLevel, LogLevel } from "./logger";

export type AppEnv = {
  scenesDir: string;
  file?: string;
  pluginField: string;
  pluginSignature: string;
  match: MatchMode;
  payloadKey: string;
  maxDepth: number;
  pick?: number;
  copy: boolean;
  print: boolean;
  host: string;
  port: number;
  logLevel: LogLevel;
  fileLogLevel: LogLevel;
  logDir?: string;
  logMaxFolderBytes?: number;
};

type EnvSource = { [key: string]: string | undefined };

export class EnvHandler {
  private static parseInteger(value: unknown, name: string, min: number): number | undefined {
    if (value === undefined || value === "") {
      return undefined;
    }
    const num = Number(value);
    if (!Number.isInteger(num) || num < min) {
      throw new Error(`Invalid ${name}: ${String(value)} (expected an integer >= ${min})`);
    }
    return num;
  }

  private static parseString(value: unknown): string | undefined {
    return typeof value === "string" && value !== "" ? value : undefined;
  }

  private static parseBoolean(value: unknown): boolean | undefined {
    if (typeof value === "boolean") {
      return value;
    }
    if (value === "true") {
      return true;
    }
    if (value === "false") {
      return false;
    }
    return undefined;
  }

  private static parseMatchMode(value: unknown, name: string): MatchMode | undefined {
    const str = EnvHandler.parseString(value);
    if (str === undefined) {
      return undefined;
    }
    if (!isMatchMode(str)) {
      throw new Error(`Invalid ${name}: ${str} (expected equals or endsWith)`);
    }
    return str;
  }

  private static parseLogLevel(value: unknown, name: string): LogLevel | undefined {
    const str = EnvHandler.parseString(value)?.toLowerCase();
    if (str === undefined) {
      return undefined;
    }
    if (!isLogLevel(str)) {
      throw new Error(`Invalid ${name}: ${str}`);
    }
    return str;
  }

  private constructor() {}

  private static readEnvFile(confPath: string, required: boolean): EnvSource {
    try {
      return dotenv.parse(fs.readFileSync(confPath));
    } catch (e) {
      if (!required) {
        return {};
      }
      const message = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to load env file ${confPath}: ${message}`);
    }
  }

  // Variables already set in the environment win over the .env file.
  protected static loadEnvVars(confPath: string | undefined, source: EnvSource): Partial<AppEnv> {
    const processEnv: EnvSource = { ...EnvHandler.readEnvFile(confPath ?? ".env", confPath !== undefined), ...source };
    return {
      scenesDir: EnvHandler.parseString(processEnv.OBS_SCENES_DIR),
      pluginField: EnvHandler.parseString(processEnv.PLUGIN_FIELD),
      pluginSignature: EnvHandler.parseString(processEnv.PLUGIN_SIGNATURE),
      match: EnvHandler.parseMatchMode(processEnv.PLUGIN_MATCH, "PLUGIN_MATCH"),
      payloadKey: EnvHandler.parseString(processEnv.PAYLOAD_KEY),
      maxDepth: EnvHandler.parseInteger(processEnv.MAX_DEPTH, "MAX_DEPTH", 1),
      host: EnvHandler.parseString(processEnv.HOST),
      port: EnvHandler.parseInteger(processEnv.PORT, "PORT", 0),
      logLevel: EnvHandler.parseLogLevel(processEnv.LOG_LEVEL, "LOG_LEVEL"),
      fileLogLevel: EnvHandler.parseLogLevel(processEnv.LOG_FILE_LEVEL, "LOG_FILE_LEVEL"),
      logDir: EnvHandler.parseString(processEnv.LOG_DIR),
      logMaxFolderBytes: EnvHandler.parseInteger(processEnv.LOG_MAX_FOLDER_BYTES, "LOG_MAX_FOLDER_BYTES", 0),
    };
  }

  private static removeUndefined<T extends object>(obj: T): Partial<T> {
    return Object.fromEntries(
      Object.entries(obj).filter(([, v]) => v !== undefined)
    ) as Partial<T>;
  }

  static resolveAppEnv(args: yargs.Arguments, processEnv: EnvSource = process.env): AppEnv {
    const argEnv = EnvHandler.removeUndefined<Partial<AppEnv>>({
      scenesDir: EnvHandler.parseString(args.scenesDir),
      file: EnvHandler.parseString(args.file),
      pluginField: EnvHandler.parseString(args.pluginField),
      pluginSignature: EnvHandler.parseString(args.pluginSignature),
      match: EnvHandler.parseMatchMode(args.match, "--match"),
      payloadKey: EnvHandler.parseString(args.payloadKey),
      maxDepth: EnvHandler.parseInteger(args.maxDepth, "--max-depth", 1),
      pick: EnvHandler.parseInteger(args.pick, "--pick", 1),
      copy: EnvHandler.parseBoolean(args.copy),
      print: EnvHandler.parseBoolean(args.print),
      host: EnvHandler.parseString(args.host),
      port: EnvHandler.parseInteger(args.port, "--port", 0),
      logLevel: EnvHandler.parseLogLevel(args.logLevel, "--log-level"),
      logDir: EnvHandler.parseString(args.logDir),
      logMaxFolderBytes: EnvHandler.parseInteger(args.logMaxFolderBytes, "--log-max-folder-bytes", 0),
    });
    const procEnv = EnvHandler.removeUndefined(
      EnvHandler.loadEnvVars(EnvHandler.parseString(args.env), processEnv)
    );
    const defaultEnv: AppEnv = {
      scenesDir: defaultScenesDir(process.platform, processEnv),
      ...DEFAULT_CHUNK_DATA_QUERY,
      copy: true,
      print: false,
      host: "127.0.0.1",
      port: 3000,
      logLevel: "info",
      fileLogLevel: "debug",
    };
    // prefer args over env vars.
    return { ...defaultEnv, ...procEnv, ...argEnv };
  }
}
