export interface Span {
  readonly start: number;
  readonly end: number;
}

export interface ParseError {
  readonly code: "PARSER_ERROR";
  readonly parseErrorId: string;
  readonly message: string;
  readonly span?: Span;
}

export interface BudgetOptions {
  readonly maxInputBytes?: number;
  readonly maxTraceEvents?: number;
}

export interface ExtractOptions {
  /**
   * Matches parse5's default. With scripting on, `<noscript>` content is raw
   * text and ends up in the output verbatim.
   */
  readonly scriptingEnabled?: boolean;
  /** Parse the input as a fragment whose context element has this tag name. */
  readonly fragmentContextTagName?: string;
  readonly budgets?: BudgetOptions;
  readonly trace?: boolean;
  readonly onParseError?: (error: ParseError) => void;
}

export type StripOptions = Omit<ExtractOptions, "trace">;

export interface TraceDecodeEvent {
  readonly seq: number;
  readonly kind: "decode";
  readonly encoding: string;
  readonly source: "bom" | "default";
}

export interface TraceBudgetEvent {
  readonly seq: number;
  readonly kind: "budget";
  readonly budget: BudgetExceededPayload["budget"];
  readonly limit: number | null;
  readonly actual: number;
  readonly status: "ok" | "exceeded";
}

export interface TraceParseErrorEvent {
  readonly seq: number;
  readonly kind: "parse-error";
  readonly parseErrorId: string;
  readonly startOffset: number | null;
}

export interface TraceTextEvent {
  readonly seq: number;
  readonly kind: "text";
  readonly chunks: number;
  readonly length: number;
}

export type TraceEvent = TraceDecodeEvent | TraceBudgetEvent | TraceParseErrorEvent | TraceTextEvent;

export interface ExtractResult {
  readonly text: string;
  readonly errors: readonly ParseError[];
  readonly trace?: readonly TraceEvent[];
}

export interface BudgetExceededPayload {
  readonly code: "BUDGET_EXCEEDED";
  readonly budget: "maxInputBytes" | "maxTraceEvents";
  readonly limit: number;
  readonly actual: number;
}
