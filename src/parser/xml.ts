import { SaxesParser } from "saxes";

import { XmlWriterError } from "../core/errors.js";
import type {
  NamespaceBinding,
  XmlAttribute,
  XmlDocument,
  XmlElement,
  XmlNode,
} from "../core/types.js";
import { createAttribute, createElement } from "../model/nodes.js";
import { EMPTY_SCOPE, bindPrefixed, bindUnprefixed } from "../model/scope.js";

interface MutableElement {
  prefix?: string;
  name: string;
  attributes: XmlAttribute[];
  scope: NamespaceBinding;
  children: XmlNode[];
}

const XMLNS_PREFIX = "xmlns:";

const freeze = (node: MutableElement): XmlElement =>
  createElement(node.name, {
    prefix: node.prefix,
    attributes: node.attributes,
    scope: node.scope,
    children: node.children,
  });

/**
 * Parses `source` into an element tree whose scope chains extend the
 * parent's chain with each element's own `xmlns` declarations.
 */
export const parseXmlDocument = (source: string): XmlDocument => {
  const parser = new SaxesParser<{ xmlns: true }>({ xmlns: true });
  const stack: MutableElement[] = [];
  let root: XmlElement | null = null;
  let parseErrorMessage: string | null = null;

  const appendChild = (node: XmlNode): void => {
    if (stack.length === 0) {
      return;
    }
    stack[stack.length - 1].children.push(node);
  };

  parser.on("error", (error) => {
    parseErrorMessage ??= String(error);
  });

  parser.on("opentag", (tag) => {
    let scope = stack.length > 0 ? stack[stack.length - 1].scope : EMPTY_SCOPE;
    const attributes: XmlAttribute[] = [];
    for (const attribute of Object.values(tag.attributes)) {
      if (attribute.name === "xmlns") {
        scope = bindUnprefixed(attribute.value, scope);
      } else if (attribute.name.startsWith(XMLNS_PREFIX)) {
        scope = bindPrefixed(attribute.name.slice(XMLNS_PREFIX.length), attribute.value, scope);
      } else {
        attributes.push(
          createAttribute(attribute.local, attribute.value, attribute.prefix || undefined)
        );
      }
    }
    stack.push({
      prefix: tag.prefix || undefined,
      name: tag.local,
      attributes,
      scope,
      children: [],
    });
  });

  parser.on("text", (value) => {
    appendChild({ kind: "text", value });
  });

  parser.on("cdata", (value) => {
    appendChild({ kind: "cdata", value });
  });

  parser.on("comment", (value) => {
    appendChild({ kind: "comment", value });
  });

  parser.on("processinginstruction", ({ target, body }) => {
    appendChild({ kind: "processingInstruction", target, data: body });
  });

  parser.on("closetag", () => {
    const node = stack.pop();
    if (!node) {
      return;
    }
    const element = freeze(node);
    if (stack.length === 0) {
      root = element;
      return;
    }
    appendChild(element);
  });

  parser.write(source).close();

  if (parseErrorMessage) {
    throw new XmlWriterError("XML_PARSE_ERROR", parseErrorMessage);
  }

  if (!root) {
    throw new XmlWriterError("XML_EMPTY", "XML document has no root element.");
  }

  return { root };
};
