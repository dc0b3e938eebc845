import { decodeHtmlBytes } from "../internal/encoding/mod.js";
import { runDocumentParse, runFragmentParse } from "../internal/parse5-runtime.js";
import { TextSink, type SinkParseError } from "../internal/sink/mod.js";

import type {
  BudgetExceededPayload,
  BudgetOptions,
  ExtractOptions,
  ExtractResult,
  ParseError,
  StripOptions,
  TraceEvent
} from "./types.js";

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
} from "./types.js";

export const DEFAULT_EXTRACT_OPTIONS = Object.freeze({
  scriptingEnabled: true,
  trace: false
});

export class BudgetExceededError extends Error {
  readonly payload: BudgetExceededPayload;

  constructor(payload: BudgetExceededPayload) {
    super(
      `Budget exceeded: ${payload.budget} limit=${String(payload.limit)} actual=${String(payload.actual)}`
    );
    this.name = "BudgetExceededError";
    this.payload = payload;
  }
}

function enforceBudget(
  budget: BudgetExceededPayload["budget"],
  limit: number | undefined,
  actual: number
): void {
  if (limit === undefined || actual <= limit) {
    return;
  }

  throw new BudgetExceededError({
    code: "BUDGET_EXCEEDED",
    budget,
    limit,
    actual
  });
}

type TraceEventInput =
  TraceEvent extends infer Event
    ? Event extends { readonly seq: number }
      ? Omit<Event, "seq">
      : never
    : never;

// Appends in place: one trace array per call, and parse errors can number in
// the tens of thousands.
function pushTrace(
  trace: TraceEvent[] | undefined,
  event: TraceEventInput,
  budgets: BudgetOptions | undefined
): void {
  if (!trace) {
    return;
  }

  const nextEvent: TraceEvent = {
    seq: trace.length + 1,
    ...event
  };
  trace.push(nextEvent);
  enforceBudget("maxTraceEvents", budgets?.maxTraceEvents, trace.length);
}

function pushBudgetTrace(
  trace: TraceEvent[] | undefined,
  budget: BudgetExceededPayload["budget"],
  limit: number | undefined,
  actual: number,
  budgets: BudgetOptions | undefined
): void {
  pushTrace(trace, {
    kind: "budget",
    budget,
    limit: limit ?? null,
    actual,
    status: limit === undefined || actual <= limit ? "ok" : "exceeded"
  }, budgets);
}

const WHATWG_PARSE_ERROR_ID_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

function normalizeParseErrorId(rawErrorCode: string): string {
  const normalized = rawErrorCode.trim();
  if (normalized.length === 0) {
    return "vendor:unknown";
  }
  if (WHATWG_PARSE_ERROR_ID_PATTERN.test(normalized)) {
    return normalized;
  }
  return `vendor:${normalized}`;
}

function toParseError(error: SinkParseError): ParseError {
  const hasOffsets = error.startOffset >= 0 && error.endOffset >= error.startOffset;
  return {
    code: "PARSER_ERROR",
    parseErrorId: normalizeParseErrorId(error.code),
    message: error.code,
    ...(hasOffsets ? { span: { start: error.startOffset, end: error.endOffset } } : {})
  };
}

function normalizeContextTagName(contextTagName: string): string {
  const normalized = contextTagName.trim().toLowerCase();
  if (normalized.length === 0) {
    throw new Error("fragmentContextTagName must be a non-empty tag name");
  }
  return normalized;
}

function extractInternal(
  input: string,
  options: ExtractOptions,
  trace: TraceEvent[] | undefined
): ExtractResult {
  const errors: ParseError[] = [];
  const sink = new TextSink({
    onParseError(error: SinkParseError): void {
      const parseError = toParseError(error);
      errors.push(parseError);
      pushTrace(trace, {
        kind: "parse-error",
        parseErrorId: parseError.parseErrorId,
        startOffset: parseError.span?.start ?? null
      }, options.budgets);
      options.onParseError?.(parseError);
    }
  });

  const runtimeOptions = {
    scriptingEnabled: options.scriptingEnabled ?? DEFAULT_EXTRACT_OPTIONS.scriptingEnabled
  };
  if (options.fragmentContextTagName !== undefined) {
    runFragmentParse(input, normalizeContextTagName(options.fragmentContextTagName), sink, runtimeOptions);
  } else {
    runDocumentParse(input, sink, runtimeOptions);
  }

  const { textChunks } = sink.stats;
  const text = sink.finish();
  pushTrace(trace, { kind: "text", chunks: textChunks, length: text.length }, options.budgets);

  return {
    text,
    errors,
    ...(trace ? { trace } : {})
  };
}

function startTrace(options: ExtractOptions): TraceEvent[] | undefined {
  return (options.trace ?? DEFAULT_EXTRACT_OPTIONS.trace) ? [] : undefined;
}

/**
 * Runs the input through the HTML5 tree-construction algorithm and keeps only
 * the text it inserts, in insertion order. Malformed markup never fails the
 * call; the parser's recovery decides which text survives and the parse errors
 * are returned alongside.
 */
export function extractText(input: string, options: ExtractOptions = {}): ExtractResult {
  const maxInputBytes = options.budgets?.maxInputBytes;
  enforceBudget("maxInputBytes", maxInputBytes, input.length);
  const trace = startTrace(options);
  pushBudgetTrace(trace, "maxInputBytes", maxInputBytes, input.length, options.budgets);

  return extractInternal(input, options, trace);
}

export function extractTextFromBytes(bytes: Uint8Array, options: ExtractOptions = {}): ExtractResult {
  const maxInputBytes = options.budgets?.maxInputBytes;
  enforceBudget("maxInputBytes", maxInputBytes, bytes.byteLength);
  const trace = startTrace(options);
  pushBudgetTrace(trace, "maxInputBytes", maxInputBytes, bytes.byteLength, options.budgets);

  const decoded = decodeHtmlBytes(bytes);
  pushTrace(trace, {
    kind: "decode",
    encoding: decoded.encoding,
    source: decoded.source
  }, options.budgets);

  return extractInternal(decoded.text, options, trace);
}

export function stripHtmlTags(input: string, options: StripOptions = {}): string {
  return extractText(input, { ...options, trace: false }).text;
}

export function stripHtmlTagsFromBytes(bytes: Uint8Array, options: StripOptions = {}): string {
  return extractTextFromBytes(bytes, { ...options, trace: false }).text;
}
