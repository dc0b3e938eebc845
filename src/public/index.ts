export {
  BudgetExceededError,
  DEFAULT_EXTRACT_OPTIONS,
  extractText,
  extractTextFromBytes,
  stripHtmlTags,
  stripHtmlTagsFromBytes
} from "./mod.js";
export { SinkContractError, TextSink, elementName, sameNode } from "../internal/sink/mod.js";

export type {
  BudgetExceededPayload,
  BudgetOptions,
  ExtractOptions,
  ExtractResult,
  ParseError,
  Span,
  StripOptions,
  TraceBudgetEvent,
  TraceDecodeEvent,
  TraceEvent,
  TraceParseErrorEvent,
  TraceTextEvent
} from "./mod.js";
export type {
  QualifiedName,
  SinkContractErrorPayload,
  SinkContractViolation,
  SinkNode,
  TextSinkTypeMap
} from "../internal/sink/mod.js";
