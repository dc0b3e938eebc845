export { SinkContractError } from "./errors.js";
export { elementName, sameNode } from "./nodes.js";
export { TextSink } from "./text-sink.js";

export type { TextSinkStats, TextSinkTypeMap } from "./text-sink.js";
export type {
  CommentNode,
  DocumentNode,
  ElementNode,
  ProcessingInstructionNode,
  QualifiedName,
  SinkContractErrorPayload,
  SinkContractViolation,
  SinkNode,
  SinkNodeKind,
  SinkParseError,
  TextSinkOptions
} from "./types.js";
