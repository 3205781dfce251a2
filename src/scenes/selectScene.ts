import path from "node:path";
import prompts from "prompts";
import { getLogger } from "../utils/logger";
import { SceneFilesError, UserCancelledError } from "./errors";
import { SceneFile } from "./sceneFiles";

const log = getLogger("scenes");

function findPreselected(files: SceneFile[], preselected: string): SceneFile | undefined {
  const resolved = path.resolve(preselected);
  return files.find((file) => file.name === preselected || path.resolve(file.path) === resolved);
}

/**
 * Pick the scene file to search. A single candidate is taken without asking;
 * otherwise the user chooses from a list.
 */
export async function selectSceneFile(
  files: SceneFile[],
  { preselected }: { preselected?: string } = {},
): Promise<SceneFile> {
  if (preselected) {
    const match = findPreselected(files, preselected);
    if (!match) {
      throw new SceneFilesError("file-not-found", preselected);
    }
    log.debug(`Selected "${match.path}" from the command line`);
    return match;
  }

  files.forEach((file, i) => log.info(`${i + 1}: ${file.name}`));
  if (files.length === 1) {
    log.debug(`Automatically selected the only JSON file: "${files[0].path}"`);
    return files[0];
  }

  const onCancel = () => {
    throw new UserCancelledError();
  };

  const ans = await prompts({
    type: "select",
    name: "index",
    message: "Select a scene collection:",
    choices: files.map((file, i) => ({ title: file.name, description: file.path, value: i })),
    initial: 0,
  }, { onCancel });

  const index: unknown = ans.index;
  if (typeof index !== "number" || !files[index]) {
    throw new UserCancelledError();
  }
  return files[index];
}
