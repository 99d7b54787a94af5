import { createElement, createTextElement, type XmlElement } from "./xml";

/**
 * Builders for the pgModeler `.dbm` vocabulary.
 * Attribute insertion order is the order pgModeler itself writes.
 */

export const PGMODELER_VERSION = "0.9.2";
export const PUBLIC_SCHEMA = "public";
export const DEFAULT_OWNER = "postgres";

export const INTEGER_TYPES: readonly string[] = ["smallint", "integer", "bigint"];

/** Schema-qualified name, e.g. `public.users` */
export function qualified(name: string): string {
	return `${PUBLIC_SCHEMA}.${name}`;
}

export function bool(value: boolean): string {
	return value ? "true" : "false";
}

export function createDbModel(): XmlElement {
	return createElement("dbmodel", {
		"pgmodeler-ver": PGMODELER_VERSION,
		"last-position": "0,0",
		"last-zoom": "1",
		"max-obj-count": "4",
		"default-schema": PUBLIC_SCHEMA,
		"default-owner": DEFAULT_OWNER,
	});
}

export function databaseElement(name: string): XmlElement {
	return createElement("database", {
		name,
		"is-template": "false",
		"allow-conns": "true",
	});
}

export function publicSchemaElement(): XmlElement {
	return createElement("schema", {
		name: PUBLIC_SCHEMA,
		layer: "0",
		"fill-color": "#e1e1e1",
		"sql-disabled": "true",
	});
}

export function citextExtensionElement(): XmlElement {
	return createElement("extension", { name: "citext", "handles-type": "true" }, [schemaRef()]);
}

export function schemaRef(): XmlElement {
	return createElement("schema", { name: PUBLIC_SCHEMA });
}

export function roleRef(): XmlElement {
	return createElement("role", { name: DEFAULT_OWNER });
}

export function positionElement(x: number, y: number): XmlElement {
	return createElement("position", { x: String(x), y: String(y) });
}

export function commentElement(text: string): XmlElement {
	return createTextElement("comment", text, { cdata: true });
}

export function domainElement(
	name: string,
	baseType: string,
	constraintName: string,
	expression: string
): XmlElement {
	return createElement("domain", { name, "not-null": "false" }, [
		schemaRef(),
		roleRef(),
		createElement("type", { name: baseType, length: "0" }),
		createElement("constraint", { name: constraintName, type: "check" }, [
			createTextElement("expression", expression, { cdata: true }),
		]),
	]);
}

export function enumTypeElement(name: string, values: readonly string[]): XmlElement {
	return createElement("usertype", { name, configuration: "enumeration" }, [
		schemaRef(),
		roleRef(),
		createElement("enumeration", { values: values.join(",") }),
	]);
}

export function textboxElement(name: string, x: number, y: number): XmlElement {
	return createElement("textbox", { name, layer: "0", "font-size": "9" }, [
		positionElement(x, y),
		commentElement(name),
	]);
}

const NEUTRAL_BODY = "#fcfcfc,#fcfcfc,#808080";
const BLACK = "#000000";

/**
 * @param titleColors colors of the table title bar: fill, fill, border
 */
export function tagElement(name: string, titleColors: readonly string[], comment: string): XmlElement {
	const style = (id: string, colors: string) => createElement("style", { id, colors });
	return createElement("tag", { name }, [
		style("table-body", NEUTRAL_BODY),
		style("table-ext-body", NEUTRAL_BODY),
		style("table-name", BLACK),
		style("table-schema-name", BLACK),
		style("table-title", titleColors.join(",")),
		commentElement(comment),
	]);
}

export function checkConstraintElement(name: string, table: string, expression: string): XmlElement {
	return createElement("constraint", { name, type: "ck-constr", table: qualified(table) }, [
		createTextElement("expression", expression, { cdata: true }),
	]);
}

export function primaryKeyElement(table: string, columns: readonly string[]): XmlElement {
	return createElement("constraint", { name: `${table}_pk`, type: "pk-constr", table: qualified(table) }, [
		createElement("columns", { names: columns.join(","), "ref-type": "src-columns" }),
	]);
}

export interface IndexElementSpec {
	readonly name: string;
	readonly table: string;
	readonly unique: boolean;
	readonly columns: readonly { readonly name: string; readonly descend: boolean }[];
}

export function indexElement(spec: IndexElementSpec): XmlElement {
	return createElement(
		"index",
		{
			name: spec.name,
			table: qualified(spec.table),
			concurrent: "false",
			unique: bool(spec.unique),
			"fast-update": "false",
			buffering: "false",
			"index-type": "btree",
			factor: "0",
		},
		spec.columns.map((column) =>
			createElement(
				"idxelement",
				{ "use-sorting": "true", "nulls-first": "false", "asc-order": bool(!column.descend) },
				[createElement("column", { name: column.name })]
			)
		)
	);
}

export interface RelationshipSpec {
	readonly name: string;
	readonly sourceColumn: string;
	/** The referenced (parent) table */
	readonly sourceTable: string;
	/** The table owning the foreign key */
	readonly destinationTable: string;
	readonly required: boolean;
	readonly identifier: boolean;
	readonly updateAction: string;
	readonly deleteAction: string;
}

export function relationshipElement(spec: RelationshipSpec): XmlElement {
	return createElement(
		"relationship",
		{
			name: spec.name,
			type: "rel1n",
			layer: "0",
			"src-col-pattern": spec.sourceColumn,
			"pk-pattern": "{dt}_pk",
			"uq-pattern": "{dt}_uq",
			"src-fk-pattern": "{st}_fk",
			"src-table": qualified(spec.sourceTable),
			"dst-table": qualified(spec.destinationTable),
			"src-required": bool(spec.required),
			"dst-required": "false",
			identifier: bool(spec.identifier),
			"upd-action": spec.updateAction,
			"del-action": spec.deleteAction,
		},
		[createElement("label", { "ref-type": "name-label" }, [positionElement(0, 0)])]
	);
}

/**
 * plpgsql trigger function that touches a timestamp column whenever the
 * row changes, the equivalent of ON UPDATE CURRENT_TIMESTAMP.
 */
export function updateTimestampFunctionElement(name: string, column: string): XmlElement {
	const body = [
		"BEGIN",
		"    IF (NEW::varchar != OLD::varchar) THEN",
		`        NEW.${column} = CURRENT_TIMESTAMP;`,
		"        RETURN NEW;",
		"    END IF;",
		"    RETURN OLD;",
		"END;",
		"",
	].join("\n");

	return createElement(
		"function",
		{
			name,
			"window-func": "false",
			"returns-setof": "false",
			"behavior-type": "CALLED ON NULL INPUT",
			"function-type": "VOLATILE",
			"security-type": "SECURITY INVOKER",
			"execution-cost": "1000",
			"row-amount": "0",
		},
		[
			schemaRef(),
			roleRef(),
			commentElement(`ON UPDATE CURRENT TIMESTAMP equivalent for column ${column}`),
			createElement("language", { name: "plpgsql", "sql-disabled": "true" }),
			createElement("return-type", {}, [createElement("type", { name: "trigger", length: "0" })]),
			createTextElement("definition", body, { cdata: true }),
		]
	);
}

export interface TriggerSpec {
	readonly name: string;
	readonly firingType: string;
	readonly event: string;
	readonly table: string;
	readonly signature: string;
}

export function triggerElement(spec: TriggerSpec): XmlElement {
	const event = spec.event.toUpperCase();
	return createElement(
		"trigger",
		{
			name: spec.name,
			"firing-type": spec.firingType,
			"per-line": "true",
			constraint: "false",
			"ins-event": bool(event === "INSERT"),
			"del-event": bool(event === "DELETE"),
			"upd-event": bool(event === "UPDATE"),
			"trunc-event": "false",
			table: qualified(spec.table),
		},
		[createElement("function", { signature: spec.signature })]
	);
}

/** Column display order hint: `object` entries keyed by original position. */
export function customIndexesElement(objectType: string, entries: ReadonlyMap<number, string>): XmlElement {
	return createElement(
		"customidxs",
		{ "object-type": objectType },
		[...entries].map(([index, name]) => createElement("object", { name, index: String(index) }))
	);
}
