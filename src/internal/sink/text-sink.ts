import { html, type Token, type TreeAdapter, type TreeAdapterTypeMap } from "parse5";

import { failContract } from "./errors.js";
import {
  createCommentNode,
  createDocumentNode,
  createElementNode,
  createProcessingInstructionNode,
  elementName,
  requireElement
} from "./nodes.js";
import type {
  CommentNode,
  DocumentNode,
  ElementNode,
  ProcessingInstructionNode,
  SinkNode,
  SinkParseError,
  TextSinkOptions
} from "./types.js";

export type TextSinkTypeMap = TreeAdapterTypeMap<
  SinkNode,
  SinkNode,
  SinkNode,
  DocumentNode,
  DocumentNode,
  ElementNode,
  CommentNode,
  never,
  ElementNode,
  never
>;

export interface TextSinkStats {
  readonly textChunks: number;
  readonly textLength: number;
}

/**
 * Tree adapter that keeps nothing but text.
 *
 * parse5 owns the document topology on its open-element stack; every query it
 * makes about parents or children is answered with "none", which keeps all
 * insertions on the append path. Text is appended to a single buffer in the
 * order the parser delivers it, whichever node it is nominally attached to.
 */
export class TextSink implements TreeAdapter<TextSinkTypeMap> {
  #text = "";
  #textChunks = 0;
  #finished = false;
  #documentMode: html.DOCUMENT_MODE = html.DOCUMENT_MODE.NO_QUIRKS;
  readonly #onParseError: ((error: SinkParseError) => void) | undefined;

  constructor(options: TextSinkOptions = {}) {
    this.#onParseError = options.onParseError;
  }

  get stats(): TextSinkStats {
    return { textChunks: this.#textChunks, textLength: this.#text.length };
  }

  finish(): string {
    this.#assertOpen("finish");
    this.#finished = true;

    const text = this.#text;
    this.#text = "";
    return text;
  }

  parseError(error: SinkParseError): void {
    this.#onParseError?.(error);
  }

  // Node creation

  createDocument(): DocumentNode {
    this.#assertOpen("createDocument");
    return createDocumentNode();
  }

  createDocumentFragment(): DocumentNode {
    this.#assertOpen("createDocumentFragment");
    return createDocumentNode();
  }

  createElement(tagName: string, namespaceURI: html.NS, attrs: Token.Attribute[]): ElementNode {
    this.#assertOpen("createElement");
    return createElementNode(tagName, namespaceURI, attrs);
  }

  createCommentNode(data: string): CommentNode {
    this.#assertOpen("createCommentNode");
    return createCommentNode();
  }

  createProcessingInstruction(target: string, data: string): ProcessingInstructionNode {
    this.#assertOpen("createProcessingInstruction");
    return createProcessingInstructionNode();
  }

  createTextNode(value: string): never {
    return failContract({ code: "UNSUPPORTED_NODE", operation: "createTextNode" });
  }

  // Text and tree mutation

  appendChild(parentNode: SinkNode, newNode: SinkNode): void {
    // Structure is not tracked.
  }

  insertText(parentNode: SinkNode, text: string): void {
    this.#appendText(text, "insertText");
  }

  insertBefore(parentNode: SinkNode, newNode: SinkNode, referenceNode: SinkNode): never {
    return failContract({ code: "UNSUPPORTED_INSERTION", operation: "insertBefore" });
  }

  insertTextBefore(parentNode: SinkNode, text: string, referenceNode: SinkNode): never {
    return failContract({ code: "UNSUPPORTED_INSERTION", operation: "insertTextBefore" });
  }

  detachNode(node: SinkNode): void {
    // No parent links to remove.
  }

  adoptAttributes(recipient: ElementNode, attrs: Token.Attribute[]): void {
    // Attributes never reach the output.
  }

  setDocumentType(document: DocumentNode, name: string, publicId: string, systemId: string): void {
    // Doctypes carry no text.
  }

  setDocumentMode(document: DocumentNode, mode: html.DOCUMENT_MODE): void {
    this.#assertOpen("setDocumentMode");
    this.#documentMode = mode;
  }

  getDocumentMode(document: DocumentNode): html.DOCUMENT_MODE {
    return this.#documentMode;
  }

  setTemplateContent(templateElement: ElementNode, contentElement: DocumentNode): void {
    // Template contents are handed out fresh on every request.
  }

  getTemplateContent(templateElement: ElementNode): DocumentNode {
    this.#assertOpen("getTemplateContent");
    return createDocumentNode();
  }

  // Tree queries

  getFirstChild(node: SinkNode): null {
    return null;
  }

  getChildNodes(node: SinkNode): SinkNode[] {
    return [];
  }

  getParentNode(node: SinkNode): null {
    return null;
  }

  getAttrList(element: SinkNode): Token.Attribute[] {
    return [...requireElement(element, "getAttrList").integrationAttrs];
  }

  getTagName(element: SinkNode): string {
    return elementName(element, "getTagName").tagName;
  }

  getNamespaceURI(element: SinkNode): html.NS {
    return elementName(element, "getNamespaceURI").namespaceURI;
  }

  getCommentNodeContent(commentNode: CommentNode): string {
    return "";
  }

  getTextNodeContent(textNode: never): never {
    return failContract({ code: "UNSUPPORTED_NODE", operation: "getTextNodeContent" });
  }

  getDocumentTypeNodeName(doctypeNode: never): never {
    return failContract({ code: "UNSUPPORTED_NODE", operation: "getDocumentTypeNodeName" });
  }

  getDocumentTypeNodePublicId(doctypeNode: never): never {
    return failContract({ code: "UNSUPPORTED_NODE", operation: "getDocumentTypeNodePublicId" });
  }

  getDocumentTypeNodeSystemId(doctypeNode: never): never {
    return failContract({ code: "UNSUPPORTED_NODE", operation: "getDocumentTypeNodeSystemId" });
  }

  isTextNode(node: SinkNode): node is never {
    return false;
  }

  isCommentNode(node: SinkNode): node is CommentNode {
    return node.kind === "comment";
  }

  isDocumentTypeNode(node: SinkNode): node is never {
    return false;
  }

  isElementNode(node: SinkNode): node is ElementNode {
    return node.kind === "element";
  }

  // Source locations are never requested from the parser.

  setNodeSourceCodeLocation(node: SinkNode, location: Token.ElementLocation | null): void {
    // Locations are off.
  }

  getNodeSourceCodeLocation(node: SinkNode): undefined {
    return undefined;
  }

  updateNodeSourceCodeLocation(node: SinkNode, location: Partial<Token.ElementLocation>): void {
    // Locations are off.
  }

  #appendText(text: string, operation: string): void {
    this.#assertOpen(operation);
    this.#text += text;
    this.#textChunks += 1;
  }

  #assertOpen(operation: string): void {
    if (this.#finished) {
      failContract({ code: "SINK_FINISHED", operation });
    }
  }
}
