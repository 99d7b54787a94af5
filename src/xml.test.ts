import { describe, test, expect } from "vitest";
import { ErrorCodes } from "./errors";
import {
	createElement,
	createTextElement,
	findChild,
	findChildren,
	parseXml,
	requireChild,
	serializeXml,
	XML_DECLARATION,
} from "./xml";

describe("parseXml", () => {
	test("builds an ordered element tree", () => {
		const root = parseXml(`<?xml version="1.0"?>
			<data grt_format="2.0">
				<!-- ignored -->
				<value type="string" key="name">orders &amp; items</value>
				<link type="object" key="owner">id-1</link>
			</data>`);

		expect(root.tag).toBe("data");
		expect(root.attributes).toEqual({ grt_format: "2.0" });
		expect(root.children.map((c) => c.tag)).toEqual(["value", "link"]);
		expect(root.children[0].text).toBe("orders & items");
		expect(root.children[1].attributes).toEqual({ type: "object", key: "owner" });
	});

	test("decodes bytes as UTF-8", () => {
		const root = parseXml(new TextEncoder().encode("<a>grüße</a>"));
		expect(root.text).toBe("grüße");
	});

	test("reads CDATA sections", () => {
		const root = parseXml("<definition><![CDATA[a < b]]></definition>");
		expect(root.text).toBe("a < b");
		expect(root.cdata).toBe(true);
	});

	test("rejects malformed documents", () => {
		expect(() => parseXml("<a><b></a>")).toThrow(expect.objectContaining({ code: ErrorCodes.INVALID_XML }));
	});
});

describe("queries", () => {
	const root = parseXml(`
		<value id="m">
			<value key="catalog" struct-name="db.mysql.Catalog"/>
			<value key="diagrams"/>
			<value key="diagrams" struct-name="workbench.physical.Diagram"/>
		</value>`);

	test("findChild matches tag, key and struct-name", () => {
		expect(findChild(root, "value", { key: "catalog" })?.attributes["struct-name"]).toBe("db.mysql.Catalog");
		expect(findChild(root, "value", { key: "diagrams", structName: "workbench.physical.Diagram" })).toBe(root.children[2]);
		expect(findChild(root, "link")).toBeUndefined();
	});

	test("findChildren keeps document order", () => {
		expect(findChildren(root, "value", { key: "diagrams" })).toEqual([root.children[1], root.children[2]]);
	});

	test("requireChild names the parent and the missing child", () => {
		expect(() => requireChild(root, "value", { key: "tables" })).toThrow(
			'Element <value id="m"> has no <value key="tables"> child'
		);
	});
});

describe("serializeXml", () => {
	test("writes a tab-indented document with attributes in insertion order", () => {
		const root = createElement("dbmodel", { "pgmodeler-ver": "0.9.2", "default-schema": "public" }, [
			createElement("schema", { name: "public" }),
			createElement("textbox", { name: "Core" }, [createTextElement("comment", "Core")]),
		]);

		expect(serializeXml(root)).toBe(
			[
				'<?xml version="1.0" encoding="UTF-8"?>',
				'<dbmodel pgmodeler-ver="0.9.2" default-schema="public">',
				'\t<schema name="public"/>',
				'\t<textbox name="Core">',
				"\t\t<comment>Core</comment>",
				"\t</textbox>",
				"</dbmodel>",
				"",
			].join("\n")
		);
	});

	test("keeps CDATA text and reparses to the same tree", () => {
		const root = createElement("function", { name: "f" }, [
			createTextElement("definition", "IF a >= 0 THEN", { cdata: true }),
		]);
		const xml = serializeXml(root);

		expect(xml).toContain("<![CDATA[IF a >= 0 THEN]]>");
		expect(parseXml(xml)).toEqual(root);
	});

	test("closes CDATA elements on the same line", () => {
		const root = createElement("function", { name: "f" }, [
			createTextElement("definition", "IF a >= 0 THEN", { cdata: true }),
		]);

		expect(serializeXml(root)).toBe(
			[
				XML_DECLARATION,
				'<function name="f">',
				"\t<definition><![CDATA[IF a >= 0 THEN]]></definition>",
				"</function>",
				"",
			].join("\n")
		);
	});
});
