export type DocumentLeaf = string | number | boolean | null;
export type DocumentSequence = DocumentNode[];
export type DocumentMapping = { [key: string]: DocumentNode };
export type DocumentNode = DocumentLeaf | DocumentSequence | DocumentMapping;

/** A key or index on the way from the document root to a node. */
export type PathSegment = string | number;

export type ClassifiedNode =
  | { kind: "mapping"; node: DocumentMapping }
  | { kind: "sequence"; node: DocumentSequence }
  | { kind: "leaf"; node: DocumentLeaf }
  | { kind: "invalid"; node: unknown };

// Children are checked as the walker reaches them.
function isMapping(value: object): value is DocumentMapping {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Sorts a parsed value into one of the three document node kinds. Anything a
 * JSON parse cannot produce (undefined, functions, bigints, class instances)
 * is reported as `invalid`.
 */
export function classifyNode(value: unknown): ClassifiedNode {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return { kind: "leaf", node: value };
    case "object":
      if (value === null) {
        return { kind: "leaf", node: null };
      }
      if (Array.isArray(value)) {
        return { kind: "sequence", node: value };
      }
      if (isMapping(value)) {
        return { kind: "mapping", node: value };
      }
      return { kind: "invalid", node: value };
    default:
      return { kind: "invalid", node: value };
  }
}

/**
 * Render a path the way it would be written in code.
 *
 * input: ["sources", 2, "filters", 0, "settings"]
 * output: "sources[2].filters[0].settings"
 *
 * input: ["my key", 1]
 * output: '["my key"][1]'
 */
export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) {
    return "$";
  }
  let result = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      result += `[${segment}]`;
    } else if (/^[A-Za-z_$][\w$]*$/.test(segment)) {
      result += result ? `.${segment}` : segment;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}
