import path from "node:path";
import {
  ExtractionMatch,
  MatchMode,
  createPluginPredicate,
  findMatches,
  formatPath,
  DEFAULT_MAX_DEPTH,
  DEFAULT_PAYLOAD_KEY,
  DEFAULT_PLUGIN_FIELD,
  DEFAULT_PLUGIN_SIGNATURE,
} from "../extractor";
import { Clipboard } from "../scenes/clipboard";
import { readSceneFile } from "../scenes/sceneFiles";
import { getLogger } from "../utils/logger";

const log = getLogger("chunk-data");

export type ChunkDataQuery = {
  pluginField: string;
  pluginSignature: string;
  match: MatchMode;
  payloadKey: string;
  maxDepth: number;
};

export const DEFAULT_CHUNK_DATA_QUERY: ChunkDataQuery = {
  pluginField: DEFAULT_PLUGIN_FIELD,
  pluginSignature: DEFAULT_PLUGIN_SIGNATURE,
  match: "endsWith",
  payloadKey: DEFAULT_PAYLOAD_KEY,
  maxDepth: DEFAULT_MAX_DEPTH,
};

export type ChunkDataResult = {
  file: string;
  matches: ExtractionMatch[];
};

/**
 * A bare file name is looked up in the scenes folder; anything with a
 * directory part is taken as a path.
 */
export function resolveScenePath(file: string, scenesDir: string): string {
  if (path.isAbsolute(file) || path.basename(file) !== file) {
    return path.resolve(file);
  }
  return path.join(scenesDir, file);
}

export async function extractChunkData(
  filePath: string,
  query: Partial<ChunkDataQuery> = {},
): Promise<ChunkDataResult> {
  const q = { ...DEFAULT_CHUNK_DATA_QUERY, ...query };
  const document = await readSceneFile(filePath);
  const predicate = createPluginPredicate({ field: q.pluginField, signature: q.pluginSignature, match: q.match });
  const matches = findMatches(document, predicate, q.payloadKey, { maxDepth: q.maxDepth });
  log.debug(`Found ${matches.length} ${q.payloadKey} entries in "${filePath}"`);
  return { file: filePath, matches };
}

export type PresentOptions = {
  clipboard: Clipboard;
  /** Copy to the clipboard. When false the chosen payload is only reported. */
  copy?: boolean;
  /** 1-based index of the match to use when several are found. */
  pick?: number;
  /** Write the chosen payload to `stdout`. */
  print?: boolean;
  stdout?: (text: string) => void;
  /** Used in the messages shown to the user. */
  pluginLabel?: string;
  payloadKey?: string;
};

export type PresentOutcome =
  | { kind: "none" }
  | { kind: "copied"; match: ExtractionMatch }
  | { kind: "selected"; match: ExtractionMatch }
  | { kind: "ambiguous"; matches: ExtractionMatch[] };

function pickMatch(matches: ExtractionMatch[], pick: number | undefined): ExtractionMatch | undefined {
  if (matches.length === 1) {
    return matches[0];
  }
  if (pick === undefined) {
    return undefined;
  }
  if (!Number.isInteger(pick) || pick < 1 || pick > matches.length) {
    throw new RangeError(`pick must be between 1 and ${matches.length}, got ${pick}`);
  }
  return matches[pick - 1];
}

/**
 * Copy the payload when the choice is unambiguous, otherwise tell the user
 * what was found.
 */
export async function presentMatches(matches: ExtractionMatch[], options: PresentOptions): Promise<PresentOutcome> {
  const {
    clipboard,
    copy = true,
    pick,
    print = false,
    stdout = (text: string) => process.stdout.write(`${text}\n`),
    pluginLabel = "ReaFIR",
    payloadKey = DEFAULT_PAYLOAD_KEY,
  } = options;

  if (!matches.length) {
    log.warn(`${pluginLabel} not found`);
    log.warn(`No ${payloadKey} found`);
    return { kind: "none" };
  }

  const chosen = pickMatch(matches, pick);
  if (!chosen) {
    log.warn(`Multiple ${payloadKey} entries found; not copying`);
    matches.forEach((match, i) => {
      log.info(`${i + 1}: ${formatPath(match.path)} (${match.payload.length} chars)`);
    });
    return { kind: "ambiguous", matches };
  }

  if (print) {
    stdout(chosen.payload);
  }
  if (!copy) {
    return { kind: "selected", match: chosen };
  }
  await clipboard.write(chosen.payload);
  log.info(`${payloadKey} copied to clipboard`);
  return { kind: "copied", match: chosen };
}
