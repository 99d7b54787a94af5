import { describe, test, expect, vi } from "vitest";
import { mapColumn, parseEnumValues } from "./columnMapping";
import { ErrorCodes } from "./errors";
import { Logger } from "./logger";
import type { Column, DataType, Table, UserType } from "./model";
import { SynthesisContext } from "./synthesisContext";
import { createSimpleType } from "./typeCatalog";
import { createElement, createTextElement, type XmlElement } from "./xml";

function simple(name: string): DataType {
	return createSimpleType(`com.mysql.rdbms.mysql.datatype.${name}`);
}

const BOOL: UserType = {
	kind: "user",
	id: "ut-bool",
	nativeType: "com.mysql.rdbms.mysql.datatype.tinyint",
	category: "TINYINT",
	name: "BOOL",
	sqlDefinition: "TINYINT(1)",
	actualType: createSimpleType("com.mysql.rdbms.mysql.datatype.tinyint"),
};

function col(overrides: Partial<Column> & { name: string }): Column {
	return {
		id: overrides.name,
		tableId: "t-items",
		isNotNull: false,
		autoIncrement: false,
		defaultValue: undefined,
		defaultValueIsNull: false,
		length: -1,
		precision: -1,
		scale: -1,
		datatypeExplicitParams: undefined,
		comment: undefined,
		flags: [],
		type: simple("int"),
		...overrides,
	};
}

const items: Table = {
	id: "t-items",
	name: "items",
	nextAutoInc: undefined,
	columns: [],
	indexes: [],
	foreignKeys: [],
	triggers: [],
};

function context(citext = false) {
	const log = new Logger();
	log.setLevel("silent");
	const ctx = new SynthesisContext(createElement("dbmodel"), citext, log);
	return { ctx, log };
}

function typeOf(element: XmlElement): Record<string, string> {
	return element.children[0].attributes;
}

describe("mapColumn type table", () => {
	const cases: [string, Record<string, string>][] = [
		["smallint", { name: "smallint", length: "0" }],
		["json", { name: "json", length: "0" }],
		["decimal", { name: "decimal", length: "0" }],
		["varchar", { name: "varchar", length: "0" }],
		["bigint", { name: "bigint", length: "0" }],
		["date", { name: "date", length: "0" }],
		["char", { name: "char", length: "0" }],
		["int", { name: "integer", length: "0" }],
		["tinyint", { name: "smallint", length: "0" }],
		["float", { name: "real", length: "0" }],
		["double", { name: "double precision", length: "0" }],
		["timestamp", { name: "timestamp with time zone", length: "0", "with-timezone": "true" }],
		["timestamp_f", { name: "timestamp with time zone", length: "0", "with-timezone": "true" }],
		["datetime", { name: "timestamp with time zone", length: "0", "with-timezone": "true" }],
		["datetime_f", { name: "timestamp with time zone", length: "0", "with-timezone": "true" }],
		["time", { name: "time with time zone", length: "0", "with-timezone": "true" }],
		["tinytext", { name: "varchar", length: "255" }],
		["text", { name: "varchar", length: "65535" }],
		["mediumtext", { name: "text", length: "0" }],
		["longtext", { name: "text", length: "0" }],
	];

	test.each(cases)("%s", (source, expected) => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "value", type: simple(source) }));
		expect(typeOf(element)).toEqual(expected);
	});

	test("unknown categories fall back to smallint with a warning", () => {
		const { ctx, log } = context();
		const warn = vi.spyOn(log, "warn");
		const { element } = mapColumn(ctx, items, col({ name: "data", type: simple("blob") }));

		expect(typeOf(element)).toEqual({ name: "smallint", length: "0" });
		expect(warn).toHaveBeenCalledWith("Unknown type BLOB on items.data, using smallint");
	});

	test("TINYINT through a boolean alias is a boolean", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "active", type: BOOL, defaultValue: "1", precision: 1 }));

		expect(element.attributes).toEqual({ name: "active", "default-value": "TRUE" });
		expect(typeOf(element)).toEqual({ name: "boolean", length: "0" });
	});
});

describe("mapColumn column attributes", () => {
	test("not-null and identity, in pgModeler order", () => {
		const { ctx } = context();
		const table = { ...items, nextAutoInc: "100" };
		const { element } = mapColumn(ctx, table, col({ name: "id", isNotNull: true, autoIncrement: true }));

		expect(Object.entries(element.attributes)).toEqual([
			["name", "id"],
			["not-null", "true"],
			["identity-type", "ALWAYS"],
			["start", "100"],
		]);
	});

	test("identity only applies to integer types", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "code", type: simple("decimal"), autoIncrement: true }));
		expect(element.attributes).toEqual({ name: "code" });
	});

	test("comments follow the type", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "id", comment: "Primary key" }));

		expect(element.children.map((c) => c.tag)).toEqual(["type", "comment"]);
		expect(element.children[1].text).toBe("Primary key");
	});
});

describe("mapColumn enums", () => {
	test("materializes a named enumeration type", () => {
		const { ctx } = context();
		const { element } = mapColumn(
			ctx,
			items,
			col({ name: "status", type: simple("enum"), datatypeExplicitParams: "('new', 'paid' ,'shipped')" })
		);

		expect(typeOf(element)).toEqual({ name: "public.enum_status", length: "0" });
		expect(ctx.root.children).toHaveLength(1);
		expect(ctx.root.children[0]).toEqual(
			createElement("usertype", { name: "enum_status", configuration: "enumeration" }, [
				createElement("schema", { name: "public" }),
				createElement("role", { name: "postgres" }),
				createElement("enumeration", { values: "new,paid,shipped" }),
			])
		);
	});

	test("a second enum column of the same name gets a distinct type", () => {
		const { ctx } = context();
		const status = col({ name: "status", type: simple("enum"), datatypeExplicitParams: "('a','b')" });
		const first = mapColumn(ctx, items, status);
		const second = mapColumn(ctx, { ...items, name: "orders" }, status);

		expect(typeOf(first.element).name).toBe("public.enum_status");
		expect(typeOf(second.element).name).toBe("public.enum_2_status");
		expect(ctx.stats.enums).toBe(2);
	});

	test("parseEnumValues requires a parenthesized list of quoted literals", () => {
		expect(parseEnumValues(" ('x', ' y ') ")).toEqual(["x", "y"]);
		expect(() => parseEnumValues("'a','b'")).toThrow(expect.objectContaining({ code: ErrorCodes.INVALID_ENUM_LITERAL }));
		expect(() => parseEnumValues("(a,'b')")).toThrow(expect.objectContaining({ code: ErrorCodes.INVALID_ENUM_LITERAL }));
		expect(() => parseEnumValues(undefined)).toThrow(expect.objectContaining({ code: ErrorCodes.INVALID_ENUM_LITERAL }));
	});
});

describe("mapColumn numeric specs", () => {
	test("unsigned precision becomes a shared range domain", () => {
		const { ctx } = context();
		const amount = col({ name: "amount", precision: 10, flags: ["UNSIGNED"] });
		const first = mapColumn(ctx, items, amount);
		const second = mapColumn(ctx, items, col({ name: "total", precision: 10, flags: ["UNSIGNED"] }));

		expect(typeOf(first.element)).toEqual({ name: "public.uinteger10", length: "0" });
		expect(typeOf(second.element)).toEqual({ name: "public.uinteger10", length: "0" });
		expect(first.constraints).toEqual([]);
		expect(ctx.root.children).toHaveLength(1);
		expect(ctx.root.children[0]).toEqual(
			createElement("domain", { name: "uinteger10", "not-null": "false" }, [
				createElement("schema", { name: "public" }),
				createElement("role", { name: "postgres" }),
				createElement("type", { name: "integer", length: "0" }),
				createElement("constraint", { name: "range10", type: "check" }, [
					createTextElement("expression", "VALUE >= 0 AND VALUE <= 9999999999", { cdata: true }),
				]),
			])
		);
	});

	test("signed precision domains are symmetric", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "delta", type: simple("bigint"), precision: 5 }));

		expect(typeOf(element).name).toBe("public.bigint5");
		expect(ctx.root.children[0].children[3].children[0].text).toBe("VALUE >= -99999 AND VALUE <= 99999");
	});

	test("identity columns keep their integer type", () => {
		const { ctx, log } = context();
		const info = vi.spyOn(log, "info");
		const { element } = mapColumn(ctx, items, col({ name: "id", autoIncrement: true, precision: 11, flags: ["UNSIGNED"] }));

		expect(typeOf(element)).toEqual({ name: "integer", length: "0" });
		expect(ctx.root.children).toHaveLength(0);
		expect(info).toHaveBeenCalledWith("Identity column items.id cannot use a range domain, ignoring precision 11");
		expect(info).toHaveBeenCalledWith("Identity column items.id cannot use an unsigned domain, keeping integer");
	});

	test("precision with scale is native fixed point", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "price", type: simple("decimal"), precision: 10, scale: 2 }));
		expect(typeOf(element)).toEqual({ name: "decimal", length: "10", precision: "2" });
	});

	test("timestamp precision is fractional seconds", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "at", type: simple("datetime"), precision: 3 }));
		expect(typeOf(element)).toEqual({ name: "timestamp with time zone", length: "0", "with-timezone": "true", precision: "3" });
	});

	test("length alone", () => {
		const { ctx } = context();
		const { element } = mapColumn(ctx, items, col({ name: "code", type: simple("varchar"), length: 12 }));
		expect(typeOf(element)).toEqual({ name: "varchar", length: "12" });
	});

	test("contradictory specs are fatal", () => {
		const { ctx } = context();
		const attempt = (column: Column) => () => mapColumn(ctx, items, column);
		const invalid = expect.objectContaining({ code: ErrorCodes.INVALID_NUMERIC_SPEC });

		expect(attempt(col({ name: "a", type: simple("decimal"), length: 5, scale: 2 }))).toThrow(invalid);
		expect(attempt(col({ name: "b", type: simple("decimal"), scale: 2 }))).toThrow(invalid);
		expect(attempt(col({ name: "c", type: simple("text"), length: 100 }))).toThrow(invalid);
	});
});

describe("mapColumn flags", () => {
	test("UNSIGNED integers use the built-in unsigned domain", () => {
		const { ctx } = context();
		const { element, constraints } = mapColumn(ctx, items, col({ name: "qty", flags: ["UNSIGNED"] }));

		expect(typeOf(element).name).toBe("public.uinteger");
		expect(constraints).toEqual([]);
	});

	test("UNSIGNED on other types is a check constraint", () => {
		const { ctx } = context();
		const { element, constraints } = mapColumn(
			ctx,
			items,
			col({ name: "price", type: simple("decimal"), precision: 8, scale: 2, flags: ["UNSIGNED"] })
		);

		expect(typeOf(element).name).toBe("decimal");
		expect(constraints).toHaveLength(1);
		expect(constraints[0].attributes).toEqual({ name: "items_price_ge0", type: "ck-constr", table: "public.items" });
		expect(constraints[0].children[0].text).toBe("price >= 0");
	});

	test("other flags are ignored with a warning", () => {
		const { ctx, log } = context();
		const warn = vi.spyOn(log, "warn");
		const { element } = mapColumn(ctx, items, col({ name: "qty", flags: ["ZEROFILL"] }));

		expect(typeOf(element).name).toBe("integer");
		expect(warn).toHaveBeenCalledWith("Unsupported flag ZEROFILL on items.qty");
	});
});

describe("mapColumn citext", () => {
	test("varchar becomes citext with a length check", () => {
		const { ctx } = context(true);
		const { element, constraints } = mapColumn(ctx, items, col({ name: "name", type: simple("varchar"), length: 45 }));

		expect(typeOf(element)).toEqual({ name: "citext" });
		expect(constraints[0].attributes["name"]).toBe("items_name_len");
		expect(constraints[0].children[0].text).toBe("length(name) <= 45");
	});

	test("char gets an exact length check", () => {
		const { ctx } = context(true);
		const { constraints } = mapColumn(ctx, items, col({ name: "code", type: simple("char"), length: 2 }));
		expect(constraints[0].children[0].text).toBe("length(code) = 2");
	});

	test("text types stay as they are", () => {
		const { ctx } = context(true);
		const { element, constraints } = mapColumn(ctx, items, col({ name: "body", type: simple("longtext") }));
		expect(typeOf(element)).toEqual({ name: "text", length: "0" });
		expect(constraints).toEqual([]);
	});
});

describe("mapColumn defaults", () => {
	const defaultOf = (column: Column, ctx = context().ctx) => mapColumn(ctx, items, column).element.attributes["default-value"];

	test("literals pass through", () => {
		expect(defaultOf(col({ name: "a", defaultValue: "0" }))).toBe("0");
		expect(defaultOf(col({ name: "b", defaultValue: "TRUE", type: BOOL }))).toBe("TRUE");
		expect(defaultOf(col({ name: "c", defaultValue: "0", type: BOOL }))).toBe("FALSE");
		expect(defaultOf(col({ name: "d", defaultValue: "'none'", type: simple("varchar"), length: 10 }))).toBe("'none'");
		expect(defaultOf(col({ name: "e", defaultValue: "CURRENT_TIMESTAMP", type: simple("timestamp") }))).toBe("CURRENT_TIMESTAMP");
	});

	test("unknown expressions are kept with a warning", () => {
		const { ctx, log } = context();
		const warn = vi.spyOn(log, "warn");

		expect(defaultOf(col({ name: "n", defaultValue: "42" }), ctx)).toBe("42");
		expect(warn).toHaveBeenCalledWith("Unknown default value 42 on items.n, passing it through");
	});

	test("NULL defaults are dropped with a warning", () => {
		const { ctx, log } = context();
		const warn = vi.spyOn(log, "warn");

		expect(defaultOf(col({ name: "n", defaultValue: "NULL", defaultValueIsNull: true }), ctx)).toBeUndefined();
		expect(warn).toHaveBeenCalledWith("Unsupported NULL default on items.n");
	});

	test("ON UPDATE CURRENT_TIMESTAMP registers an update trigger", () => {
		const { ctx } = context();
		const column = col({ name: "updated_at", type: simple("timestamp"), defaultValue: "CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP" });

		expect(defaultOf(column, ctx)).toBe("CURRENT_TIMESTAMP");
		expect(ctx.updateFunctions.map((f) => f.attributes["name"])).toEqual(["update_updated_at_on_update"]);
		expect(ctx.updateTriggers.map((t) => t.attributes["name"])).toEqual(["items_t_update_updated_at"]);
	});
});
