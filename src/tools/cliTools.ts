import path from "node:path";
import pc from "picocolors";
import { Clipboard, SystemClipboard } from "../scenes/clipboard";
import { listSceneFiles, SceneFile } from "../scenes/sceneFiles";
import { selectSceneFile } from "../scenes/selectScene";
import type { AppEnv } from "../utils/envHandler";
import { getLogger } from "../utils/logger";
import { extractChunkData, presentMatches, PresentOutcome, resolveScenePath } from "./chunkDataTools";

const log = getLogger("cli");

export type CliDeps = {
  clipboard?: Clipboard;
  stdout?: (text: string) => void;
};

const writeLine = (text: string) => {
  process.stdout.write(`${text}\n`);
};

async function chooseSceneFile(env: AppEnv): Promise<string> {
  // A path skips the folder listing entirely.
  if (env.file && path.basename(env.file) !== env.file) {
    return resolveScenePath(env.file, env.scenesDir);
  }
  const files = await listSceneFiles(env.scenesDir);
  const selected = await selectSceneFile(files, { preselected: env.file });
  return selected.path;
}

/**
 * Find the plugin's chunk data in one scene collection and copy it when the
 * result is unambiguous.
 */
export async function runExtract(env: AppEnv, deps: CliDeps = {}): Promise<PresentOutcome> {
  const filePath = await chooseSceneFile(env);
  log.debug(`Selected file: "${filePath}"`);
  const { matches } = await extractChunkData(filePath, env);
  return presentMatches(matches, {
    clipboard: deps.clipboard ?? new SystemClipboard(),
    copy: env.copy,
    pick: env.pick,
    print: env.print,
    stdout: deps.stdout ?? writeLine,
    pluginLabel: env.pluginSignature,
    payloadKey: env.payloadKey,
  });
}

export async function runListScenes(env: AppEnv, deps: CliDeps = {}): Promise<SceneFile[]> {
  const stdout = deps.stdout ?? writeLine;
  const files = await listSceneFiles(env.scenesDir);
  files.forEach((file, i) => {
    stdout(`${pc.bold(String(i + 1))}: ${file.name} ${pc.dim(`(${file.path})`)}`);
  });
  return files;
}
