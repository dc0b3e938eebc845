// Entry point into parse5's tree construction with the text sink as its tree adapter.
import { html, parse, parseFragment, type ParserError, type ParserOptions } from "parse5";

import type { TextSink, TextSinkTypeMap } from "./sink/mod.js";

export interface RuntimeParseOptions {
  readonly scriptingEnabled: boolean;
}

function parserOptions(sink: TextSink, options: RuntimeParseOptions): ParserOptions<TextSinkTypeMap> {
  return {
    treeAdapter: sink,
    scriptingEnabled: options.scriptingEnabled,
    // Text insertion reads child lists back when locations are on.
    sourceCodeLocationInfo: false,
    onParseError(error: ParserError): void {
      sink.parseError({
        code: error.code,
        startOffset: error.startOffset,
        endOffset: error.endOffset
      });
    }
  };
}

// Foreign roots keep their namespace so that the tokenizer treats the
// fragment as foreign content (CDATA sections included).
function contextNamespace(contextTagName: string): html.NS {
  if (contextTagName === "svg") {
    return html.NS.SVG;
  }

  if (contextTagName === "math") {
    return html.NS.MATHML;
  }

  return html.NS.HTML;
}

export function runDocumentParse(input: string, sink: TextSink, options: RuntimeParseOptions): void {
  parse(input, parserOptions(sink, options));
}

export function runFragmentParse(
  input: string,
  contextTagName: string,
  sink: TextSink,
  options: RuntimeParseOptions
): void {
  const context = sink.createElement(contextTagName, contextNamespace(contextTagName), []);
  parseFragment(context, input, parserOptions(sink, options));
}
