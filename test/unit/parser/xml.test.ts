import assert from "node:assert/strict";
import { test } from "vitest";

import { XmlWriterError } from "../../../src/core/errors.js";
import type { XmlElement } from "../../../src/core/types.js";
import { EMPTY_SCOPE } from "../../../src/model/scope.js";
import { parseXmlDocument } from "../../../src/parser/xml.js";

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof XmlWriterError);
    assert.equal(error.code, code);
    return true;
  });
};

const firstElement = (element: XmlElement): XmlElement => {
  const child = element.children.find((node): node is XmlElement => node.kind === "element");
  assert.ok(child);
  return child;
};

test("parseXmlDocument builds scope chains from declarations", () => {
  const { root } = parseXmlDocument(
    `<a xmlns="urn:x" xmlns:p="urn:p" p:id="1" b="2"><p:c/></a>`
  );
  assert.equal(root.name, "a");
  assert.equal(root.prefix, undefined);
  assert.deepEqual(root.attributes, [
    { prefix: "p", name: "id", value: "1" },
    { name: "b", value: "2" },
  ]);
  assert.equal(root.scope.kind, "prefixed");
  if (root.scope.kind !== "prefixed") {
    return;
  }
  assert.equal(root.scope.prefix, "p");
  assert.equal(root.scope.uri, "urn:p");
  assert.equal(root.scope.parent.kind, "unprefixed");
  if (root.scope.parent.kind !== "unprefixed") {
    return;
  }
  assert.equal(root.scope.parent.uri, "urn:x");
  assert.equal(root.scope.parent.parent, EMPTY_SCOPE);

  const child = firstElement(root);
  assert.equal(child.prefix, "p");
  assert.equal(child.name, "c");
  assert.equal(child.scope, root.scope);
});

test("parseXmlDocument keeps non-element children in order", () => {
  const { root } = parseXmlDocument(`<a><!--c--><?pi data?><![CDATA[z]]>t</a>`);
  assert.deepEqual(root.children, [
    { kind: "comment", value: "c" },
    { kind: "processingInstruction", target: "pi", data: "data" },
    { kind: "cdata", value: "z" },
    { kind: "text", value: "t" },
  ]);
});

test("parseXmlDocument throws parse and empty errors", () => {
  expectCode(() => parseXmlDocument("<a"), "XML_PARSE_ERROR");
  expectCode(() => parseXmlDocument(""), "XML_EMPTY");
  expectCode(() => parseXmlDocument("<!-- only-comment -->"), "XML_PARSE_ERROR");
  expectCode(() => parseXmlDocument("<p:a/>"), "XML_PARSE_ERROR");
});
