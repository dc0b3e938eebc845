import assert from "node:assert/strict";
import test from "node:test";

import {
  BudgetExceededError,
  DEFAULT_EXTRACT_OPTIONS,
  extractText,
  stripHtmlTags,
  type ParseError
} from "../src/public/index.js";

test("strips a single element", () => {
  assert.equal(stripHtmlTags("<html>Hello World!</html>"), "Hello World!");
});

test("nested elements contribute text in document order", () => {
  assert.equal(stripHtmlTags("<html>Hello<div>World!</div></html>"), "HelloWorld!");
  assert.equal(stripHtmlTags("<html>Hel<div>lo</div>World!</html>"), "HelloWorld!");
});

test("template contents stay at their point of occurrence", () => {
  const input = '<html>aaa <template id="aaa">bbb </template><title>ccc ddd</title></html>';

  assert.equal(stripHtmlTags(input), "aaa bbb ccc ddd");
});

test("nested anchors are split without losing text", () => {
  assert.equal(stripHtmlTags("<html><a>a<a>b</a>c</a></html>"), "abc");
});

test("misnested formatting keeps text order through the adoption agency", () => {
  assert.equal(stripHtmlTags("<b>1<p>2</b>3</p>"), "123");
});

test("foster-parented table text is neither reordered nor dropped", () => {
  const input = "<html>a<table> b<tr> <td>c</td> </tr>d </table>e</html>";

  assert.equal(stripHtmlTags(input), "a b c d e");
});

test("malformed markup degrades to best-effort text", () => {
  assert.equal(stripHtmlTags("<html>a<b</html>"), "a");
  assert.equal(stripHtmlTags("<html>a < b</html>"), "a < b");
  assert.equal(stripHtmlTags("<html>a>b</html>"), "a>b");
  assert.equal(stripHtmlTags("<html>a > b</html>"), "a > b");
});

test("comments, doctypes and processing instructions carry no text", () => {
  assert.equal(stripHtmlTags("<!DOCTYPE html><p>a<!-- hidden -->b</p>"), "ab");
  assert.equal(stripHtmlTags("<p>a<?xml version=\"1.0\"?>b</p>"), "ab");
});

test("character references are decoded by the parser", () => {
  assert.equal(stripHtmlTags("<p>a &amp; b &lt;c&gt;</p>"), "a & b <c>");
});

test("script and style bodies are text to the tree builder", () => {
  assert.equal(stripHtmlTags("<p>x</p><script>var y = 1;</script>"), "xvar y = 1;");
});

test("noscript follows the scripting flag", () => {
  const input = "<body><noscript><p>hi</p></noscript></body>";

  assert.equal(DEFAULT_EXTRACT_OPTIONS.scriptingEnabled, true);
  assert.equal(stripHtmlTags(input), "<p>hi</p>");
  assert.equal(stripHtmlTags(input, { scriptingEnabled: false }), "hi");
});

test("empty input and text-free markup produce empty output", () => {
  assert.equal(stripHtmlTags(""), "");
  assert.equal(stripHtmlTags("<div class='x'><span title='y'></span></div>"), "");
});

test("extraction is a pure function of its input", () => {
  const input = "<html>a<table> b<tr> <td>c</td> </tr>d </table>e</html>";

  assert.equal(stripHtmlTags(input), stripHtmlTags(input));
  assert.deepEqual(extractText(input), extractText(input));
});

test("parse errors are reported without failing the extraction", () => {
  const seen: ParseError[] = [];
  const result = extractText("<html>a<b</html>", {
    onParseError(error) {
      seen.push(error);
    }
  });

  assert.equal(result.text, "a");
  assert.deepEqual(seen, result.errors);
  assert.ok(result.errors.some((error) => error.parseErrorId === "missing-doctype"));

  const solidus = result.errors.find((error) => error.parseErrorId === "unexpected-solidus-in-tag");
  assert.ok(solidus);
  assert.equal(solidus.code, "PARSER_ERROR");
  assert.equal(solidus.message, "unexpected-solidus-in-tag");
});

test("well-formed documents report no parse errors", () => {
  assert.deepEqual(extractText("<!DOCTYPE html><p>ok</p>").errors, []);
});

test("trace records the budget check and the final text", () => {
  const result = extractText("<!DOCTYPE html><p>ok</p>", { trace: true });

  assert.deepEqual(result.trace, [
    { seq: 1, kind: "budget", budget: "maxInputBytes", limit: null, actual: 24, status: "ok" },
    { seq: 2, kind: "text", chunks: 1, length: 2 }
  ]);
});

test("trace is absent unless requested", () => {
  assert.equal("trace" in extractText("<p>ok</p>"), false);
});

test("trace lists parse errors in report order", () => {
  const result = extractText("<html>a<b</html>", { trace: true });
  const parseErrorIds = (result.trace ?? []).flatMap((event) =>
    event.kind === "parse-error" ? [event.parseErrorId] : []
  );

  assert.deepEqual(
    parseErrorIds,
    result.errors.map((error) => error.parseErrorId)
  );
});

test("a trace keeps one event per parse error", () => {
  const result = extractText("<p>" + "&#0;".repeat(5000), { trace: true });
  const trace = result.trace ?? [];

  assert.ok(result.errors.length > 5000);
  assert.equal(trace.length, result.errors.length + 2);
  assert.deepEqual(
    trace.map((event) => event.seq),
    trace.map((_, index) => index + 1)
  );
});

test("the trace event budget stops a runaway trace", () => {
  assert.throws(
    () => extractText("<html>a<b</html>", { trace: true, budgets: { maxTraceEvents: 3 } }),
    (error: unknown) =>
      error instanceof BudgetExceededError &&
      error.payload.budget === "maxTraceEvents" &&
      error.payload.limit === 3 &&
      error.payload.actual === 4
  );
  assert.equal(stripHtmlTags("<html>a<b</html>", { budgets: { maxTraceEvents: 3 } }), "a");
});

test("input over the byte budget is rejected before parsing", () => {
  assert.throws(
    () => extractText("<p>too long</p>", { budgets: { maxInputBytes: 4 } }),
    (error: unknown) =>
      error instanceof BudgetExceededError &&
      error.message === "Budget exceeded: maxInputBytes limit=4 actual=15" &&
      error.payload.limit === 4 &&
      error.payload.actual === 15
  );
  assert.equal(stripHtmlTags("<p>ok</p>", { budgets: { maxInputBytes: 9 } }), "ok");
});

test("fragments are parsed in their context element", () => {
  assert.equal(stripHtmlTags("<b>x</b>"), "x");
  assert.equal(stripHtmlTags("<b>x</b>", { fragmentContextTagName: "title" }), "<b>x</b>");
  assert.equal(stripHtmlTags("<td>c1</td><td>c2</td>", { fragmentContextTagName: " TR " }), "c1c2");
});

test("svg and math fragment contexts parse their content as foreign", () => {
  assert.equal(stripHtmlTags("<![CDATA[x]]>y", { fragmentContextTagName: "svg" }), "xy");
  assert.equal(stripHtmlTags("<![CDATA[x]]>y", { fragmentContextTagName: "math" }), "xy");
  assert.equal(stripHtmlTags("<![CDATA[x]]>y", { fragmentContextTagName: "div" }), "y");
});

test("an empty fragment context is rejected", () => {
  assert.throws(
    () => extractText("<p>x</p>", { fragmentContextTagName: "  " }),
    { message: "fragmentContextTagName must be a non-empty tag name" }
  );
});
