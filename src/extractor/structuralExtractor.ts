import { DocumentMapping, PathSegment, classifyNode } from "./document";
import { MalformedDocumentError } from "./errors";

export type FilterEntryPredicate = (entry: DocumentMapping) => boolean;

export type ExtractOptions = {
  /**
   * Deepest container nesting accepted before the document is rejected.
   * The root container counts as depth 1. Defaults to 1000.
   */
  maxDepth?: number;
};

export type ExtractionMatch = {
  payload: string;
  /** Location of the matching entry, from the root. */
  path: PathSegment[];
  entry: DocumentMapping;
};

export const DEFAULT_MAX_DEPTH = 1000;

type Frame = {
  value: unknown;
  /** Frame of the containing node; undefined for the root. */
  parent?: Frame;
  segment?: PathSegment;
  /** Number of containers above this value. */
  depth: number;
};

function pathOf(frame: Frame): PathSegment[] {
  const path: PathSegment[] = [];
  for (let f: Frame | undefined = frame; f?.segment !== undefined; f = f.parent) {
    path.push(f.segment);
  }
  return path.reverse();
}

function resolveMaxDepth(options: ExtractOptions): number {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return maxDepth;
}

/**
 * Textual form of a payload value. `null` counts as a missing payload.
 * Nested structures are serialized as compact JSON in their native key order.
 */
export function coercePayload(value: unknown): string | undefined {
  const classified = classifyNode(value);
  switch (classified.kind) {
    case "leaf":
      return classified.node === null ? undefined : String(classified.node);
    case "mapping":
    case "sequence":
      return JSON.stringify(classified.node);
    case "invalid":
      return undefined;
  }
}

/**
 * Walk a parsed document depth-first and collect the payload of every mapping
 * the predicate accepts, in the order the mappings are first reached.
 *
 * Descent does not stop at a match, so entries nested inside a matching entry
 * are found as well. The walk uses its own stack; deep documents are bounded by
 * `maxDepth`, not by the call stack.
 *
 * @throws MalformedDocumentError if the nesting exceeds `maxDepth` or a node is
 * not a mapping, sequence or leaf.
 */
export function findMatches(
  root: unknown,
  predicate: FilterEntryPredicate,
  payloadKey: string,
  options: ExtractOptions = {},
): ExtractionMatch[] {
  const maxDepth = resolveMaxDepth(options);
  const matches: ExtractionMatch[] = [];
  const stack: Frame[] = [{ value: root, depth: 0 }];

  let frame: Frame | undefined;
  while ((frame = stack.pop()) !== undefined) {
    const classified = classifyNode(frame.value);
    if (classified.kind === "invalid") {
      throw new MalformedDocumentError("invalid-node", pathOf(frame), maxDepth);
    }
    if (classified.kind === "leaf") {
      continue;
    }

    const depth = frame.depth + 1;
    if (depth > maxDepth) {
      throw new MalformedDocumentError("depth-exceeded", pathOf(frame), maxDepth);
    }

    if (classified.kind === "sequence") {
      const items = classified.node;
      // Pushed in reverse so index 0 is popped first.
      for (let i = items.length - 1; i >= 0; i--) {
        stack.push({ value: items[i], parent: frame, segment: i, depth });
      }
      continue;
    }

    const mapping = classified.node;
    if (predicate(mapping) && Object.prototype.hasOwnProperty.call(mapping, payloadKey)) {
      const payload = coercePayload(mapping[payloadKey]);
      if (payload !== undefined) {
        matches.push({ payload, path: pathOf(frame), entry: mapping });
      }
    }
    const keys = Object.keys(mapping);
    for (let i = keys.length - 1; i >= 0; i--) {
      const key = keys[i];
      stack.push({ value: mapping[key], parent: frame, segment: key, depth });
    }
  }

  return matches;
}

/**
 * Extract the payloads of every matching entry in traversal order.
 * An empty result means nothing matched; more than one means the caller has to
 * disambiguate.
 */
export function extract(
  root: unknown,
  predicate: FilterEntryPredicate,
  payloadKey: string,
  options: ExtractOptions = {},
): string[] {
  return findMatches(root, predicate, payloadKey, options).map((match) => match.payload);
}
