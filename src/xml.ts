import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { ErrorCodes, InputFormatError } from "./errors";

/**
 * Mutable element tree shared by the reader (source documents) and the
 * synthesizer (destination documents). Mixed content is not modelled:
 * an element carries either text or child elements.
 */
export interface XmlElement {
	tag: string;
	attributes: Record<string, string>;
	children: XmlElement[];
	text?: string;
	/** Serialize text as a CDATA section */
	cdata?: boolean;
}

export interface ChildFilter {
	/** Value of the `key` attribute */
	readonly key?: string;
	/** Value of the `struct-name` attribute */
	readonly structName?: string;
}

const TEXT_NODE = "#text";
const CDATA_NODE = "#cdata";
const ATTRIBUTES_NODE = ":@";

const PARSER_OPTIONS = {
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: "",
	textNodeName: TEXT_NODE,
	cdataPropName: CDATA_NODE,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
	htmlEntities: true,
} as const;

const BUILDER_OPTIONS = {
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: "",
	textNodeName: TEXT_NODE,
	cdataPropName: CDATA_NODE,
	format: true,
	indentBy: "\t",
	suppressEmptyNode: true,
} as const;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/** Line break the builder puts between a CDATA section and its closing tag. */
const CDATA_CLOSE_BREAK = /\]\]>\n\t*<\//g;

export function createElement(
	tag: string,
	attributes: Record<string, string> = {},
	children: XmlElement[] = []
): XmlElement {
	return { tag, attributes: { ...attributes }, children };
}

export function createTextElement(tag: string, text: string, options: { cdata?: boolean } = {}): XmlElement {
	const element = createElement(tag);
	element.text = text;
	if (options.cdata) {
		element.cdata = true;
	}
	return element;
}

/**
 * Parse an XML document and return its root element.
 * Whitespace-only text, comments, processing instructions and the
 * declaration are dropped.
 */
export function parseXml(input: string | Uint8Array): XmlElement {
	const text = typeof input === "string" ? input : Buffer.from(input).toString("utf-8");

	const validation = XMLValidator.validate(text);
	if (validation !== true) {
		throw new InputFormatError(ErrorCodes.INVALID_XML, `Invalid XML: ${validation.err.msg}`, {
			line: validation.err.line,
			column: validation.err.col,
		});
	}

	const parsed: unknown = new XMLParser(PARSER_OPTIONS).parse(text);
	const roots = toElements(parsed);
	if (roots.length !== 1) {
		throw new InputFormatError(ErrorCodes.INVALID_XML, `Expected one root element, found ${roots.length}`);
	}
	return roots[0];
}

/**
 * Serialize an element tree as a tab-indented UTF-8 document.
 * Attribute order is insertion order, so equal trees give equal output.
 */
export function serializeXml(root: XmlElement): string {
	const built: string = new XMLBuilder(BUILDER_OPTIONS).build([toOrderedNode(root)]);
	const body = built.replace(CDATA_CLOSE_BREAK, "]]></");
	return `${XML_DECLARATION}${body.startsWith("\n") ? "" : "\n"}${body}\n`;
}

export function matchesFilter(element: XmlElement, filter: ChildFilter): boolean {
	if (filter.key !== undefined && element.attributes["key"] !== filter.key) return false;
	if (filter.structName !== undefined && element.attributes["struct-name"] !== filter.structName) return false;
	return true;
}

export function findChild(element: XmlElement, tag: string, filter: ChildFilter = {}): XmlElement | undefined {
	return element.children.find((child) => child.tag === tag && matchesFilter(child, filter));
}

export function findChildren(element: XmlElement, tag: string, filter: ChildFilter = {}): XmlElement[] {
	return element.children.filter((child) => child.tag === tag && matchesFilter(child, filter));
}

/**
 * Like findChild, but a missing child means the document is malformed.
 */
export function requireChild(element: XmlElement, tag: string, filter: ChildFilter = {}): XmlElement {
	const child = findChild(element, tag, filter);
	if (!child) {
		throw new InputFormatError(
			ErrorCodes.MALFORMED_DOCUMENT,
			`Element <${element.tag}${describeElement(element)}> has no <${tag}${describeFilter(filter)}> child`,
			{ parentId: element.attributes["id"], tag, ...filter }
		);
	}
	return child;
}

export function describeElement(element: XmlElement): string {
	const parts: string[] = [];
	for (const name of ["key", "struct-name", "id"]) {
		const value = element.attributes[name];
		if (value !== undefined) {
			parts.push(` ${name}="${value}"`);
		}
	}
	return parts.join("");
}

function describeFilter(filter: ChildFilter): string {
	let result = "";
	if (filter.key !== undefined) result += ` key="${filter.key}"`;
	if (filter.structName !== undefined) result += ` struct-name="${filter.structName}"`;
	return result;
}

// === fast-xml-parser ordered format ===

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toElements(nodes: unknown): XmlElement[] {
	const list: unknown[] = Array.isArray(nodes) ? nodes : [];
	const elements: XmlElement[] = [];
	for (const node of list) {
		if (!isRecord(node)) continue;
		const tag = Object.keys(node).find((k) => k !== ATTRIBUTES_NODE);
		if (tag === undefined || tag === TEXT_NODE || tag === CDATA_NODE) continue;
		elements.push(toElement(tag, node[tag], node[ATTRIBUTES_NODE]));
	}
	return elements;
}

function toElement(tag: string, content: unknown, attributes: unknown): XmlElement {
	const element = createElement(tag);

	if (isRecord(attributes)) {
		for (const [name, value] of Object.entries(attributes)) {
			element.attributes[name] = String(value);
		}
	}

	const list: unknown[] = Array.isArray(content) ? content : [];
	let text: string | undefined;
	for (const node of list) {
		if (!isRecord(node)) continue;
		if (TEXT_NODE in node) {
			text = (text ?? "") + String(node[TEXT_NODE]);
		} else if (CDATA_NODE in node) {
			text = (text ?? "") + collectText(node[CDATA_NODE]);
			element.cdata = true;
		}
	}
	if (text !== undefined) {
		element.text = text;
	}
	element.children = toElements(list);
	return element;
}

function collectText(nodes: unknown): string {
	const list: unknown[] = Array.isArray(nodes) ? nodes : [];
	return list.map((node) => (isRecord(node) && TEXT_NODE in node ? String(node[TEXT_NODE]) : "")).join("");
}

function toOrderedNode(element: XmlElement): Record<string, unknown> {
	const content: Record<string, unknown>[] = [];
	if (element.text !== undefined && element.text !== "") {
		content.push(
			element.cdata
				? { [CDATA_NODE]: [{ [TEXT_NODE]: element.text }] }
				: { [TEXT_NODE]: element.text }
		);
	}
	for (const child of element.children) {
		content.push(toOrderedNode(child));
	}

	const node: Record<string, unknown> = { [element.tag]: content };
	if (Object.keys(element.attributes).length > 0) {
		node[ATTRIBUTES_NODE] = { ...element.attributes };
	}
	return node;
}
