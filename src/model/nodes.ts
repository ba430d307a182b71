import type {
  NamespaceBinding,
  XmlAttribute,
  XmlCData,
  XmlComment,
  XmlElement,
  XmlEntityRef,
  XmlNode,
  XmlProcessingInstruction,
  XmlText,
} from "../core/types.js";
import { EMPTY_SCOPE } from "./scope.js";

export interface CreateElementOptions {
  prefix?: string;
  attributes?: readonly XmlAttribute[];
  scope?: NamespaceBinding;
  children?: readonly XmlNode[];
}

export const createElement = (name: string, options: CreateElementOptions = {}): XmlElement => {
  const element: XmlElement = {
    kind: "element",
    name,
    attributes: options.attributes ?? [],
    scope: options.scope ?? EMPTY_SCOPE,
    children: options.children ?? [],
  };
  return options.prefix === undefined ? element : { ...element, prefix: options.prefix };
};

export const createAttribute = (name: string, value: string, prefix?: string): XmlAttribute => {
  return prefix === undefined ? { name, value } : { prefix, name, value };
};

export const createText = (value: string): XmlText => ({ kind: "text", value });

export const createCData = (value: string): XmlCData => ({ kind: "cdata", value });

export const createComment = (value: string): XmlComment => ({ kind: "comment", value });

export const createProcessingInstruction = (
  target: string,
  data: string
): XmlProcessingInstruction => ({ kind: "processingInstruction", target, data });

export const createEntityRef = (name: string): XmlEntityRef => ({ kind: "entityRef", name });
