export type SceneFilesErrorReason =
  | "folder-not-found"
  | "no-scene-files"
  | "file-not-found"
  | "invalid-json";

const MESSAGES: Record<SceneFilesErrorReason, (path: string) => string> = {
  "folder-not-found": (path) => `Scenes folder not found: "${path}"`,
  "no-scene-files": (path) => `No JSON files found in "${path}"`,
  "file-not-found": (path) => `File not found: "${path}"`,
  "invalid-json": (path) => `Error decoding json file: "${path}"`,
};

export class SceneFilesError extends Error {
  readonly reason: SceneFilesErrorReason;
  readonly path: string;

  constructor(reason: SceneFilesErrorReason, path: string, options?: { cause?: unknown }) {
    super(MESSAGES[reason](path), options);
    this.name = "SceneFilesError";
    this.reason = reason;
    this.path = path;
  }
}

export class UserCancelledError extends Error {
  constructor(message = "User cancelled input.") {
    super(message);
    this.name = "UserCancelledError";
  }
}
