import type { XmlAttribute, XmlLeafNode } from "../core/types.js";

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "\t": "&#x9;",
  "\n": "&#xA;",
  "\r": "&#xD;",
};

const TEXT_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
};

export const escapeAttributeValue = (value: string): string =>
  value.replace(/[&<>"\t\n\r]/g, (ch) => ATTRIBUTE_ESCAPES[ch] ?? ch);

export const escapeText = (value: string): string =>
  value.replace(/[&<>]/g, (ch) => TEXT_ESCAPES[ch] ?? ch);

export const quoteAttribute = (value: string): string => `"${escapeAttributeValue(value)}"`;

export const encodeAttribute = (name: string, value: string): string =>
  `${name}=${quoteAttribute(value)}`;

export const attributeQName = (attribute: XmlAttribute): string =>
  attribute.prefix ? `${attribute.prefix}:${attribute.name}` : attribute.name;

// "]]>" cannot appear inside a section, so it is split across two.
const escapeCData = (value: string): string => value.split("]]>").join("]]]]><![CDATA[>");

export const renderNode = (node: XmlLeafNode): string => {
  switch (node.kind) {
    case "text":
      return escapeText(node.value);
    case "cdata":
      return `<![CDATA[${escapeCData(node.value)}]]>`;
    case "comment":
      return `<!--${node.value}-->`;
    case "processingInstruction":
      return node.data.length > 0 ? `<?${node.target} ${node.data}?>` : `<?${node.target}?>`;
    case "entityRef":
      return `&${node.name};`;
  }
};
