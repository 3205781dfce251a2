import { PathSegment, formatPath } from "./document";

export type MalformedDocumentReason = "depth-exceeded" | "invalid-node";

export class MalformedDocumentError extends Error {
  readonly reason: MalformedDocumentReason;
  readonly path: PathSegment[];
  readonly maxDepth: number;

  constructor(reason: MalformedDocumentReason, path: PathSegment[], maxDepth: number) {
    const where = formatPath(path);
    super(
      reason === "depth-exceeded"
        ? `Document nesting exceeds the maximum depth of ${maxDepth} at ${where}`
        : `Document contains a node that is not a mapping, sequence or leaf at ${where}`
    );
    this.name = "MalformedDocumentError";
    this.reason = reason;
    this.path = path;
    this.maxDepth = maxDepth;
  }
}
