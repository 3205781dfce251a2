import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getLogger } from "../utils/logger";
import { SceneFilesError } from "./errors";

const log = getLogger("scenes");

export type SceneFile = {
  name: string;
  path: string;
};

/**
 * Folder where OBS Studio keeps its scene collections.
 *
 * win32: %APPDATA%\obs-studio\basic\scenes
 * darwin: ~/Library/Application Support/obs-studio/basic/scenes
 * other: $XDG_CONFIG_HOME/obs-studio/basic/scenes (~/.config when unset)
 */
export function defaultScenesDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  homedir: string = os.homedir(),
): string {
  switch (platform) {
    case "win32": {
      const appData = env.APPDATA || path.win32.join(homedir, "AppData", "Roaming");
      return path.win32.join(appData, "obs-studio", "basic", "scenes");
    }
    case "darwin":
      return path.posix.join(homedir, "Library", "Application Support", "obs-studio", "basic", "scenes");
    default: {
      const configHome = env.XDG_CONFIG_HOME || path.posix.join(homedir, ".config");
      return path.posix.join(configHome, "obs-studio", "basic", "scenes");
    }
  }
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

export async function listSceneFiles(scenesDir: string): Promise<SceneFile[]> {
  log.debug(`Searching for scenes folder: "${scenesDir}"`);
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(scenesDir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) {
      throw new SceneFilesError("folder-not-found", scenesDir, { cause: e });
    }
    throw e;
  }

  const files = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".json"))
    .map((entry) => ({ name: entry.name, path: path.join(scenesDir, entry.name) }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  if (!files.length) {
    throw new SceneFilesError("no-scene-files", scenesDir);
  }
  log.info(`Found ${files.length} JSON files in "${scenesDir}"`);
  return files;
}

/** Read and parse one scene collection. */
export async function readSceneFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf-8");
  } catch (e) {
    if (isMissing(e)) {
      throw new SceneFilesError("file-not-found", filePath, { cause: e });
    }
    throw e;
  }
  try {
    const data: unknown = JSON.parse(text);
    log.debug(`Successfully read json file: "${filePath}"`);
    return data;
  } catch (e) {
    throw new SceneFilesError("invalid-json", filePath, { cause: e });
  }
}
