import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import type { Element, Node } from "@xmldom/xmldom";

/** WordprocessingML main namespace */
export const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
export const XML_NS = "http://www.w3.org/XML/1998/namespace";

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
	return node.nodeType === ELEMENT_NODE;
}

/** Direct element children of a node, in document order. */
export function childElements(parent: Node): Element[] {
	const result: Element[] = [];
	const nodes = parent.childNodes;
	for (let i = 0; i < nodes.length; i++) {
		const node = nodes.item(i);
		if (node && isElement(node)) result.push(node);
	}
	return result;
}

/** True when `element` is `w:<localName>`. */
export function isW(element: Element, localName: string): boolean {
	return element.namespaceURI === W_NS && element.localName === localName;
}

/**
 * Parse a single `w:`-prefixed element from markup such as
 * `<w:rPr><w:b/></w:rPr>`. The `w` prefix is declared for you.
 */
export function parseFragment(markup: string): Element {
	const doc = new DOMParser().parseFromString(
		`<w:fragment xmlns:w="${W_NS}">${markup}</w:fragment>`,
		"text/xml",
	);
	const wrapper = doc.documentElement;
	const element = wrapper ? childElements(wrapper)[0] : undefined;
	if (!element) {
		throw new Error(`Expected one XML element, got: ${markup}`);
	}
	return element;
}

export function serializeXml(node: Node): string {
	return new XMLSerializer().serializeToString(node);
}
