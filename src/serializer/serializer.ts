import type { XmlElement, XmlNode, XmlSink } from "../core/types.js";
import { EMPTY_SCOPE, effectivePrefixedBindings, findByPrefix } from "../model/scope.js";
import { attributeQName, encodeAttribute, renderNode } from "./escape.js";
import { NamespaceScopeTracker } from "./scope-tracker.js";

interface ElementHead {
  qname: string;
  defaultDeclaration: string;
  defaultOverride: string | undefined;
}

const resolveHead = (element: XmlElement, currentDefaultUri: string): ElementHead => {
  // A prefix with no binding degrades to the unqualified name.
  const own = findByPrefix(element.scope, element.prefix ?? "") ?? EMPTY_SCOPE;
  switch (own.kind) {
    case "empty":
      return currentDefaultUri === ""
        ? { qname: element.name, defaultDeclaration: "", defaultOverride: undefined }
        : { qname: element.name, defaultDeclaration: ` xmlns=""`, defaultOverride: "" };
    case "unprefixed":
      return own.uri === currentDefaultUri
        ? { qname: element.name, defaultDeclaration: "", defaultOverride: undefined }
        : {
            qname: element.name,
            defaultDeclaration: ` ${encodeAttribute("xmlns", own.uri)}`,
            defaultOverride: own.uri,
          };
    case "prefixed":
      return {
        qname: `${own.prefix}:${element.name}`,
        defaultDeclaration: "",
        defaultOverride: undefined,
      };
  }
};

const writeElement = (
  element: XmlElement,
  sink: XmlSink,
  tracker: NamespaceScopeTracker
): void => {
  const head = resolveHead(element, tracker.currentDefaultUri());

  const declared = effectivePrefixedBindings(element.scope).filter(
    (binding) => !tracker.isDeclared(binding.prefix, binding.uri)
  );
  const prefixDeclarations = declared
    .map((binding) => ` ${encodeAttribute(`xmlns:${binding.prefix}`, binding.uri)}`)
    .join("");

  const attributes =
    element.attributes.length === 0
      ? ""
      : ` ${element.attributes
          .map((attribute) => encodeAttribute(attributeQName(attribute), attribute.value))
          .join(" ")}`;

  tracker.enter(declared, head.defaultOverride);
  sink.append(`<${head.qname}${head.defaultDeclaration}${prefixDeclarations}${attributes}`);
  if (element.children.length === 0) {
    sink.append("/>");
  } else {
    sink.append(">");
    for (let i = 0; i < element.children.length; i += 1) {
      writeNode(element.children[i], sink, tracker);
    }
    sink.append(`</${head.qname}>`);
  }
  tracker.exit();
};

const writeNode = (node: XmlNode, sink: XmlSink, tracker: NamespaceScopeTracker): void => {
  if (node.kind === "element") {
    writeElement(node, sink, tracker);
    return;
  }
  sink.append(renderNode(node));
};

/** Writes `root` and its descendants to `sink`, without an XML declaration. */
export const serialize = (root: XmlElement, sink: XmlSink): void => {
  writeElement(root, sink, new NamespaceScopeTracker());
};
