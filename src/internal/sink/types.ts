import type { html, Token } from "parse5";

export interface QualifiedName {
  readonly namespaceURI: html.NS;
  readonly tagName: string;
}

export interface DocumentNode {
  readonly kind: "document";
}

export interface CommentNode {
  readonly kind: "comment";
}

export interface ProcessingInstructionNode {
  readonly kind: "processing-instruction";
}

export interface ElementNode {
  readonly kind: "element";
  readonly name: QualifiedName;
  // Only populated for MathML annotation-xml; the parser reads its encoding
  // attribute back to decide on HTML integration points.
  readonly integrationAttrs: readonly Token.Attribute[];
}

export type SinkNode = DocumentNode | CommentNode | ProcessingInstructionNode | ElementNode;

export type SinkNodeKind = SinkNode["kind"];

export interface SinkParseError {
  readonly code: string;
  readonly startOffset: number;
  readonly endOffset: number;
}

export interface TextSinkOptions {
  readonly onParseError?: (error: SinkParseError) => void;
}

export type SinkContractViolation =
  | "NOT_AN_ELEMENT"
  | "UNSUPPORTED_INSERTION"
  | "UNSUPPORTED_NODE"
  | "SINK_FINISHED";

export interface SinkContractErrorPayload {
  readonly code: SinkContractViolation;
  readonly operation: string;
  readonly nodeKind?: SinkNodeKind;
}
