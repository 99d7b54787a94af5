import { zipSync } from "fflate";

/**
 * Builders for small MySQL Workbench documents used by the tests.
 * Every builder returns an XML fragment as a string.
 */

export const DATATYPE = "com.mysql.rdbms.mysql.datatype.";
export const BOOL_TYPE = "com.mysql.rdbms.mysql.userdatatype.bool";

export const SIMPLE_TYPES = [
	"int",
	"tinyint",
	"smallint",
	"bigint",
	"varchar",
	"char",
	"text",
	"tinytext",
	"mediumtext",
	"longtext",
	"decimal",
	"float",
	"double",
	"datetime",
	"timestamp",
	"timestamp_f",
	"time",
	"date",
	"enum",
	"json",
	"blob",
];

function escape(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function str(key: string, value: string): string {
	return `<value type="string" key="${key}">${escape(value)}</value>`;
}

export function int(key: string, value: number): string {
	return `<value type="int" key="${key}">${value}</value>`;
}

export function real(key: string, value: number): string {
	return `<value type="real" key="${key}">${value}</value>`;
}

export function link(key: string, id: string, structName = "GrtObject"): string {
	return `<link type="object" struct-name="${structName}" key="${key}">${id}</link>`;
}

export function list(key: string, items: readonly string[], contentStruct = "GrtObject"): string {
	return `<value type="list" content-type="object" content-struct-name="${contentStruct}" key="${key}">${items.join("")}</value>`;
}

export function object(structName: string, id: string, body: readonly string[], key?: string): string {
	const keyAttribute = key !== undefined ? ` key="${key}"` : "";
	return `<value type="object" struct-name="${structName}" id="${id}"${keyAttribute}>${body.join("")}</value>`;
}

export interface ColumnSpec {
	id: string;
	name: string;
	type?: string;
	userType?: string;
	isNotNull?: boolean;
	autoIncrement?: boolean;
	defaultValue?: string;
	defaultValueIsNull?: boolean;
	length?: number;
	precision?: number;
	scale?: number;
	params?: string;
	comment?: string;
	flags?: readonly string[];
}

export function column(spec: ColumnSpec): string {
	const flags = (spec.flags ?? []).map((flag) => `<value type="string">${flag}</value>`).join("");
	return object("db.mysql.Column", spec.id, [
		str("name", spec.name),
		int("isNotNull", spec.isNotNull ? 1 : 0),
		int("autoIncrement", spec.autoIncrement ? 1 : 0),
		str("defaultValue", spec.defaultValue ?? ""),
		int("defaultValueIsNull", spec.defaultValueIsNull ? 1 : 0),
		int("length", spec.length ?? -1),
		int("precision", spec.precision ?? -1),
		int("scale", spec.scale ?? -1),
		str("datatypeExplicitParams", spec.params ?? ""),
		str("comment", spec.comment ?? ""),
		`<value type="list" content-type="string" key="flags">${flags}</value>`,
		spec.userType !== undefined ? link("userType", spec.userType, "db.UserDatatype") : "",
		spec.userType === undefined ? link("simpleType", DATATYPE + (spec.type ?? "int"), "db.SimpleDatatype") : "",
	]);
}

export interface IndexSpec {
	id: string;
	name: string;
	type: "PRIMARY" | "UNIQUE" | "INDEX";
	columns: readonly { id: string; column: string; descend?: boolean }[];
}

export function index(spec: IndexSpec): string {
	const members = spec.columns.map((member) =>
		object("db.mysql.IndexColumn", member.id, [
			int("descend", member.descend ? 1 : 0),
			link("referencedColumn", member.column, "db.Column"),
		])
	);
	return object("db.mysql.Index", spec.id, [
		str("name", spec.name),
		str("indexType", spec.type),
		int("isPrimary", spec.type === "PRIMARY" ? 1 : 0),
		int("unique", spec.type === "INDEX" ? 0 : 1),
		list("columns", members, "db.mysql.IndexColumn"),
	]);
}

export interface ForeignKeySpec {
	id: string;
	name: string;
	columns: readonly string[];
	referencedTable?: string;
	many?: boolean;
	mandatory?: boolean;
	updateRule?: string;
	deleteRule?: string;
}

export function foreignKey(spec: ForeignKeySpec): string {
	const columns = spec.columns.map((id) => `<link type="object">${id}</link>`).join("");
	return object("db.mysql.ForeignKey", spec.id, [
		str("name", spec.name),
		`<value type="list" content-type="object" content-struct-name="db.Column" key="columns">${columns}</value>`,
		spec.referencedTable !== undefined ? link("referencedTable", spec.referencedTable, "db.mysql.Table") : "",
		int("many", spec.many === false ? 0 : 1),
		int("mandatory", spec.mandatory === false ? 0 : 1),
		str("updateRule", spec.updateRule ?? ""),
		str("deleteRule", spec.deleteRule ?? ""),
	]);
}

export function trigger(id: string, name: string, timing: string, event: string): string {
	return object("db.mysql.Trigger", id, [str("name", name), str("timing", timing), str("event", event)]);
}

export interface TableSpec {
	id: string;
	name: string;
	nextAutoInc?: string;
	columns: readonly string[];
	indexes?: readonly string[];
	foreignKeys?: readonly string[];
	triggers?: readonly string[];
}

export function table(spec: TableSpec): string {
	return object("db.mysql.Table", spec.id, [
		str("name", spec.name),
		str("nextAutoInc", spec.nextAutoInc ?? ""),
		list("columns", spec.columns, "db.mysql.Column"),
		list("indices", spec.indexes ?? [], "db.mysql.Index"),
		list("foreignKeys", spec.foreignKeys ?? [], "db.mysql.ForeignKey"),
		list("triggers", spec.triggers ?? [], "db.mysql.Trigger"),
	]);
}

export function view(id: string, name: string, definition: string): string {
	return object("db.mysql.View", id, [str("name", name), str("comment", ""), str("sqlDefinition", definition)]);
}

export interface FigureSpec {
	id: string;
	table: string;
	layer?: string;
	left: number;
	top: number;
	color?: string;
}

export function tableFigure(spec: FigureSpec): string {
	return object("workbench.physical.TableFigure", spec.id, [
		spec.layer !== undefined ? link("layer", spec.layer, "workbench.physical.Layer") : "",
		real("left", spec.left),
		real("top", spec.top),
		str("color", spec.color ?? ""),
		link("table", spec.table, "db.mysql.Table"),
	]);
}

export function viewFigure(id: string, viewId: string, left: number, top: number): string {
	return object("workbench.physical.ViewFigure", id, [
		real("left", left),
		real("top", top),
		link("view", viewId, "db.mysql.View"),
	]);
}

export function layer(id: string, name: string, left: number, top: number, color = ""): string {
	return object("workbench.physical.Layer", id, [
		str("name", name),
		real("left", left),
		real("top", top),
		str("color", color),
	]);
}

export function diagram(id: string, name: string, figures: readonly string[], layers: readonly string[] = []): string {
	return object("workbench.physical.Diagram", id, [
		str("name", name),
		list("connections", [], "workbench.physical.Connection"),
		list("figures", figures, "model.Figure"),
		list("layers", layers, "workbench.physical.Layer"),
	]);
}

export interface ModelSpec {
	schema?: string;
	tables: readonly string[];
	views?: readonly string[];
	diagrams: readonly string[];
}

export function physicalModel(spec: ModelSpec): string {
	const simpleTypes = SIMPLE_TYPES.map((name) => `<link type="object">${DATATYPE}${name}</link>`);
	const userTypes = [
		object("db.UserDatatype", BOOL_TYPE, [
			str("name", "BOOL"),
			str("sqlDefinition", "TINYINT(1)"),
			link("actualType", `${DATATYPE}tinyint`, "db.SimpleDatatype"),
		]),
	];
	const schema = object("db.mysql.Schema", "schema-1", [
		str("name", spec.schema ?? "shop"),
		list("tables", spec.tables, "db.mysql.Table"),
		list("views", spec.views ?? [], "db.mysql.View"),
	]);
	const catalog = object(
		"db.mysql.Catalog",
		"catalog-1",
		[
			`<value type="list" content-type="object" content-struct-name="db.SimpleDatatype" key="simpleDatatypes">${simpleTypes.join("")}</value>`,
			list("userDatatypes", userTypes, "db.UserDatatype"),
			list("schemata", [schema], "db.mysql.Schema"),
		],
		"catalog"
	);
	return object("workbench.physical.Model", "model-1", [
		str("name", "Default"),
		catalog,
		list("diagrams", spec.diagrams, "workbench.physical.Diagram"),
	]);
}

export function workbenchDocument(models: readonly string[]): string {
	return [
		'<?xml version="1.0"?>',
		'<data grt_format="2.0" document_type="MySQL Workbench Model" version="1.4.4">',
		object("workbench.Document", "document-1", [
			str("name", ""),
			list("physicalModels", models, "workbench.physical.Model"),
		]),
		"</data>",
	].join("\n");
}

/** A `.mwb` container holding the given document. */
export function mwbArchive(documentXml: string, innerName = "document.mwb.xml"): Uint8Array {
	return zipSync({
		[innerName]: new TextEncoder().encode(documentXml),
		"lock": new Uint8Array(0),
	});
}
