// Types
export type {
  DocumentLeaf,
  DocumentMapping,
  DocumentNode,
  DocumentSequence,
  PathSegment,
} from "./document";
export type {
  ExtractOptions,
  ExtractionMatch,
  FilterEntryPredicate,
} from "./structuralExtractor";
export type { MalformedDocumentReason } from "./errors";
export type { MatchMode, PluginMatcher } from "./predicates";

// Core traversal
export { extract, findMatches, coercePayload, DEFAULT_MAX_DEPTH } from "./structuralExtractor";
export { classifyNode, formatPath } from "./document";
export { MalformedDocumentError } from "./errors";

// Built-in predicates
export {
  createPluginPredicate,
  fieldEquals,
  fieldEndsWith,
  isMatchMode,
  MATCH_MODES,
  DEFAULT_PAYLOAD_KEY,
  DEFAULT_PLUGIN_FIELD,
  DEFAULT_PLUGIN_SIGNATURE,
} from "./predicates";
