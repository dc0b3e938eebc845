import { html, type Token } from "parse5";

import { failContract } from "./errors.js";
import type {
  CommentNode,
  DocumentNode,
  ElementNode,
  ProcessingInstructionNode,
  QualifiedName,
  SinkNode
} from "./types.js";

const NO_ATTRIBUTES: readonly Token.Attribute[] = Object.freeze([]);

function isAnnotationXml(tagName: string, namespaceURI: html.NS): boolean {
  return namespaceURI === html.NS.MATHML && tagName === "annotation-xml";
}

export function createDocumentNode(): DocumentNode {
  return Object.freeze({ kind: "document" });
}

export function createCommentNode(): CommentNode {
  return Object.freeze({ kind: "comment" });
}

export function createProcessingInstructionNode(): ProcessingInstructionNode {
  return Object.freeze({ kind: "processing-instruction" });
}

export function createElementNode(
  tagName: string,
  namespaceURI: html.NS,
  attrs: readonly Token.Attribute[]
): ElementNode {
  const integrationAttrs = isAnnotationXml(tagName, namespaceURI)
    ? Object.freeze(attrs.map((attr) => Object.freeze({ ...attr })))
    : NO_ATTRIBUTES;

  return Object.freeze({
    kind: "element",
    name: Object.freeze({ namespaceURI, tagName }),
    integrationAttrs
  });
}

export function isElement(node: SinkNode): node is ElementNode {
  return node.kind === "element";
}

export function requireElement(node: SinkNode, operation: string): ElementNode {
  if (!isElement(node)) {
    return failContract({ code: "NOT_AN_ELEMENT", operation, nodeKind: node.kind });
  }

  return node;
}

/**
 * Qualified name of an element handle. The parser only asks this of elements;
 * any other handle means the caller broke the tree-adapter contract.
 */
export function elementName(node: SinkNode, operation = "elementName"): QualifiedName {
  return requireElement(node, operation).name;
}

export function sameNode(x: SinkNode, y: SinkNode): boolean {
  return x === y;
}
