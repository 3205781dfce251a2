import type { DocumentLeaf } from "./document";
import type { FilterEntryPredicate } from "./structuralExtractor";

export type MatchMode = "equals" | "endsWith";

export const MATCH_MODES: readonly MatchMode[] = ["equals", "endsWith"];

export const DEFAULT_PLUGIN_FIELD = "plugin_path";
export const DEFAULT_PLUGIN_SIGNATURE = "reafir_standalone.dll";
export const DEFAULT_PAYLOAD_KEY = "chunk_data";

export function isMatchMode(value: string): value is MatchMode {
  return MATCH_MODES.some((mode) => mode === value);
}

export function fieldEquals(key: string, value: DocumentLeaf): FilterEntryPredicate {
  return (entry) => Object.prototype.hasOwnProperty.call(entry, key) && entry[key] === value;
}

export function fieldEndsWith(
  key: string,
  suffix: string,
  { ignoreCase = false }: { ignoreCase?: boolean } = {},
): FilterEntryPredicate {
  const expected = ignoreCase ? suffix.toLowerCase() : suffix;
  return (entry) => {
    if (!Object.prototype.hasOwnProperty.call(entry, key)) {
      return false;
    }
    const actual = entry[key];
    if (typeof actual !== "string") {
      return false;
    }
    return (ignoreCase ? actual.toLowerCase() : actual).endsWith(expected);
  };
}

export type PluginMatcher = {
  field?: string;
  signature?: string;
  match?: MatchMode;
  ignoreCase?: boolean;
};

/**
 * Predicate recognizing the filter entry of one plugin. With no arguments it
 * matches VST filter settings whose `plugin_path` points at the standalone
 * ReaFIR DLL.
 */
export function createPluginPredicate({
  field = DEFAULT_PLUGIN_FIELD,
  signature = DEFAULT_PLUGIN_SIGNATURE,
  match = "endsWith",
  ignoreCase = false,
}: PluginMatcher = {}): FilterEntryPredicate {
  if (match === "equals") {
    return ignoreCase
      ? (entry) => {
        const actual = entry[field];
        return typeof actual === "string" && actual.toLowerCase() === signature.toLowerCase();
      }
      : fieldEquals(field, signature);
  }
  return fieldEndsWith(field, signature, { ignoreCase });
}
