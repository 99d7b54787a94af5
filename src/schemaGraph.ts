import { AttributeBag } from "./attributes";
import { ErrorCodes, InputFormatError, ModelError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import {
	INDEX_TYPES,
	TABLE_FIGURE,
	VIEW_FIGURE,
	type Column,
	type ColumnLinks,
	type Diagram,
	type Figure,
	type ForeignKey,
	type Index,
	type IndexColumn,
	type IndexMembership,
	type IndexType,
	type Layer,
	type Table,
	type TableFigure,
	type Trigger,
	type View,
} from "./model";
import { TypeCatalog } from "./typeCatalog";
import { findChild, findChildren, requireChild, type XmlElement } from "./xml";

export const SCHEMA_STRUCT = "db.mysql.Schema";
export const DIAGRAM_STRUCT = "workbench.physical.Diagram";

const VIEW_HEADER_PATTERN = /^\s*CREATE\s+(?:[^;]*?\s)?VIEW\s+\S+\s+AS\s+/i;

/**
 * The source model of one conversion run: types, tables, views and the
 * chosen diagram, plus the column back-reference tables.
 */
export class SchemaGraph {
	private readonly _tablesById: ReadonlyMap<string, Table>;

	constructor(
		readonly schemaName: string,
		readonly types: TypeCatalog,
		readonly tables: readonly Table[],
		readonly views: readonly View[],
		readonly diagram: Diagram,
		private readonly _columnLinks: ReadonlyMap<string, ColumnLinks>
	) {
		this._tablesById = new Map(tables.map((t) => [t.id, t]));
	}

	findTable(id: string): Table | undefined {
		return this._tablesById.get(id);
	}

	foreignKeyOf(column: Column): ForeignKey | undefined {
		return this._columnLinks.get(column.id)?.foreignKey;
	}

	isForeignKeyMember(column: Column): boolean {
		return this.foreignKeyOf(column) !== undefined;
	}

	indexesOf(column: Column): readonly IndexMembership[] {
		return this._columnLinks.get(column.id)?.indexes ?? [];
	}

	/** The table column an index member points at. */
	indexColumnTarget(table: Table, indexColumn: IndexColumn): Column {
		return findColumn(table, indexColumn.columnId, { indexColumn: indexColumn.id });
	}

	tableFigure(table: Table): TableFigure | undefined {
		return this.diagram.figures.find((f): f is TableFigure => f.kind === "table" && f.tableId === table.id);
	}

	/** The layer a figure sits on, or undefined for the diagram's root layer. */
	figureLayer(figure: Figure): Layer | undefined {
		return this.diagram.layers.find((l) => l.id === figure.layerId);
	}

	/** The first table figure on the layer that carries a color of its own. */
	firstColoredTableFigure(layer: Layer): TableFigure | undefined {
		return this.diagram.figures.find(
			(f): f is TableFigure => f.kind === "table" && f.layerId === layer.id && f.color !== undefined
		);
	}
}

export interface BuildOptions {
	readonly logger?: Logger;
}

/**
 * Build the schema graph from a `workbench.physical.Model` element.
 *
 * Order matters: types, then per table columns, indexes (which register
 * index memberships), foreign keys (which need the memberships to decide
 * whether they are identifying) and triggers; the diagram comes last.
 */
export function buildSchemaGraph(model: XmlElement, options: BuildOptions = {}): SchemaGraph {
	const log = options.logger ?? defaultLogger;

	const catalog = requireChild(model, "value", { key: "catalog" });
	const schemata = findChildren(requireChild(catalog, "value", { key: "schemata" }), "value", {
		structName: SCHEMA_STRUCT,
	});
	if (schemata.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, "The catalog declares no schema", {
			catalog: catalog.attributes["id"],
		});
	}
	const schema = schemata[0];
	const schemaName = AttributeBag.read(schema).string("name");
	if (schemata.length > 1) {
		log.info(`Model has ${schemata.length} schemata, using "${schemaName}"`);
	}

	const types = TypeCatalog.build(
		requireChild(catalog, "value", { key: "simpleDatatypes" }),
		requireChild(catalog, "value", { key: "userDatatypes" })
	);

	const tableElements = requireChild(schema, "value", { key: "tables" }).children;
	if (tableElements.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `Schema "${schemaName}" has no tables`, {
			schema: schemaName,
		});
	}

	const links = new ColumnLinkTable();
	const tables = tableElements.map((element) => buildTable(element, types, links));

	const viewsElement = findChild(schema, "value", { key: "views" });
	const views = (viewsElement?.children ?? []).map(buildView);

	const diagramElements = requireChild(model, "value", { key: "diagrams" }).children;
	if (diagramElements.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, "The model has no diagram", {
			model: model.attributes["id"],
		});
	}
	const diagrams = diagramElements.map(buildDiagram);
	log.info(`Using diagram "${diagrams[0].name}"`);

	return new SchemaGraph(schemaName, types, tables, views, diagrams[0], links.freeze());
}

/**
 * Column id -> owning foreign key and index memberships.
 */
class ColumnLinkTable {
	private readonly _foreignKeys = new Map<string, ForeignKey>();
	private readonly _indexes = new Map<string, IndexMembership[]>();

	addIndexMembership(column: Column, membership: IndexMembership): void {
		const memberships = this._indexes.get(column.id) ?? [];
		if (memberships.some((m) => m.indexColumn.id === membership.indexColumn.id)) {
			throw new ModelError(
				ErrorCodes.DUPLICATE_INDEX_MEMBER,
				`Index column ${membership.indexColumn.id} is registered twice on column "${column.name}"`,
				{ column: column.name, index: membership.index.name }
			);
		}
		memberships.push(membership);
		this._indexes.set(column.id, memberships);
	}

	indexesOf(column: Column): readonly IndexMembership[] {
		return this._indexes.get(column.id) ?? [];
	}

	setForeignKey(column: Column, foreignKey: ForeignKey): void {
		const existing = this._foreignKeys.get(column.id);
		if (existing) {
			throw new ModelError(
				ErrorCodes.DUPLICATE_FOREIGN_KEY_MEMBER,
				`Column "${column.name}" belongs to foreign keys "${existing.name}" and "${foreignKey.name}"`,
				{ column: column.name, foreignKeys: [existing.name, foreignKey.name] }
			);
		}
		this._foreignKeys.set(column.id, foreignKey);
	}

	freeze(): ReadonlyMap<string, ColumnLinks> {
		const ids = new Set([...this._indexes.keys(), ...this._foreignKeys.keys()]);
		const result = new Map<string, ColumnLinks>();
		for (const id of ids) {
			result.set(id, {
				foreignKey: this._foreignKeys.get(id),
				indexes: this._indexes.get(id) ?? [],
			});
		}
		return result;
	}
}

function requireId(attrs: AttributeBag): string {
	if (attrs.id === undefined) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `${attrs.description} has no id`, {
			structName: attrs.structName,
		});
	}
	return attrs.id;
}

type ColumnOwner = Pick<Table, "name" | "columns">;

function findColumn(table: ColumnOwner, columnId: string, context: Record<string, unknown>): Column {
	const column = table.columns.find((c) => c.id === columnId);
	if (!column) {
		throw new ModelError(ErrorCodes.COLUMN_NOT_FOUND, `Column ${columnId} not found in table "${table.name}"`, {
			...context,
			table: table.name,
			column: columnId,
		});
	}
	return column;
}

function buildTable(element: XmlElement, types: TypeCatalog, links: ColumnLinkTable): Table {
	const attrs = AttributeBag.read(element);
	const id = requireId(attrs);
	const name = attrs.string("name");

	const columnElements = requireChild(element, "value", { key: "columns" }).children;
	if (columnElements.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `Table "${name}" has no columns`, { table: name });
	}
	const columns = columnElements.map((c) => buildColumn(c, id, name, types));
	const owner = { name, columns };

	const indexes = requireChild(element, "value", { key: "indices" }).children.map((indexElement) => {
		const index = buildIndex(indexElement, id, owner);
		for (const indexColumn of index.columns) {
			const column = findColumn(owner, indexColumn.columnId, { index: index.name });
			links.addIndexMembership(column, { index, indexColumn });
		}
		return index;
	});

	const foreignKeys = (findChild(element, "value", { key: "foreignKeys" })?.children ?? []).map((fkElement) =>
		buildForeignKey(fkElement, id, owner, links)
	);

	const triggers = (findChild(element, "value", { key: "triggers" })?.children ?? []).map((t) =>
		buildTrigger(t, id)
	);

	return {
		id,
		name,
		nextAutoInc: attrs.optionalText("nextAutoInc"),
		columns,
		indexes,
		foreignKeys,
		triggers,
	};
}

function buildColumn(element: XmlElement, tableId: string, tableName: string, types: TypeCatalog): Column {
	const attrs = AttributeBag.read(element);
	const id = requireId(attrs);
	const name = attrs.string("name");

	const flagsElement = findChild(element, "value", { key: "flags" });
	const flags = (flagsElement?.children ?? [])
		.map((flag) => flag.text)
		.filter((flag): flag is string => flag !== undefined && flag !== "");

	// Exactly one of userType / simpleType; an empty link counts as absent
	const userType = attrs.optionalLink("userType");
	const simpleType = attrs.optionalLink("simpleType");
	const typeId = userType ?? simpleType;
	if (typeId === undefined || (userType !== undefined && simpleType !== undefined)) {
		throw new ModelError(
			ErrorCodes.AMBIGUOUS_COLUMN_TYPE,
			`Column "${tableName}.${name}" must reference exactly one of userType or simpleType`,
			{ table: tableName, column: name, userType, simpleType }
		);
	}

	return {
		id,
		tableId,
		name,
		isNotNull: attrs.flag("isNotNull"),
		autoIncrement: attrs.flag("autoIncrement"),
		defaultValue: attrs.optionalString("defaultValue"),
		defaultValueIsNull: attrs.flag("defaultValueIsNull"),
		length: attrs.int("length"),
		precision: attrs.int("precision"),
		scale: attrs.int("scale"),
		datatypeExplicitParams: attrs.optionalString("datatypeExplicitParams"),
		comment: attrs.optionalString("comment"),
		flags,
		type: types.get(typeId),
	};
}

function toIndexType(value: string): IndexType | undefined {
	return INDEX_TYPES.find((type) => type === value);
}

function buildIndex(element: XmlElement, tableId: string, owner: ColumnOwner): Index {
	const attrs = AttributeBag.read(element);
	const id = requireId(attrs);
	const name = attrs.string("name");
	const rawType = attrs.string("indexType");
	const isPrimary = attrs.flag("isPrimary");

	const indexType = toIndexType(rawType);
	if (indexType === undefined) {
		throw new ModelError(ErrorCodes.INVALID_INDEX_TYPE, `Index "${owner.name}.${name}" has unknown type ${rawType}`, {
			table: owner.name,
			index: name,
			indexType: rawType,
		});
	}
	if (isPrimary !== (indexType === "PRIMARY")) {
		throw new ModelError(
			ErrorCodes.INVALID_INDEX_TYPE,
			`Index "${owner.name}.${name}" has type ${indexType} but isPrimary=${isPrimary}`,
			{ table: owner.name, index: name, indexType, isPrimary }
		);
	}

	const memberElements = requireChild(element, "value", { key: "columns" }).children;
	if (memberElements.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `Index "${owner.name}.${name}" has no columns`, {
			table: owner.name,
			index: name,
		});
	}

	const columns = memberElements.map((memberElement): IndexColumn => {
		const member = AttributeBag.read(memberElement);
		const columnId = member.link("referencedColumn");
		// Resolve now so a dangling member fails with the index named
		findColumn(owner, columnId, { index: name });
		return {
			id: requireId(member),
			indexId: id,
			columnId,
			descend: member.flag("descend"),
		};
	});

	return {
		id,
		tableId,
		name,
		indexType,
		isPrimary,
		unique: attrs.flag("unique"),
		columns,
	};
}

function buildForeignKey(
	element: XmlElement,
	tableId: string,
	owner: ColumnOwner,
	links: ColumnLinkTable
): ForeignKey {
	const attrs = AttributeBag.read(element);
	const name = attrs.string("name");

	const columns = requireChild(element, "value", { key: "columns" }).children.map((link) =>
		findColumn(owner, link.text ?? "", { foreignKey: name })
	);
	const primary = columns.some((column) =>
		links.indexesOf(column).some((m) => m.index.indexType === "PRIMARY")
	);

	const foreignKey: ForeignKey = {
		id: requireId(attrs),
		tableId,
		name,
		referencedTableId: attrs.optionalLink("referencedTable"),
		many: attrs.flag("many"),
		mandatory: attrs.flag("mandatory"),
		updateRule: attrs.optionalString("updateRule"),
		deleteRule: attrs.optionalString("deleteRule"),
		columnIds: columns.map((c) => c.id),
		primary,
	};

	for (const column of columns) {
		links.setForeignKey(column, foreignKey);
	}
	return foreignKey;
}

function buildTrigger(element: XmlElement, tableId: string): Trigger {
	const attrs = AttributeBag.read(element);
	return {
		id: requireId(attrs),
		tableId,
		name: attrs.string("name"),
		timing: attrs.string("timing"),
		event: attrs.string("event"),
	};
}

function buildView(element: XmlElement): View {
	const attrs = AttributeBag.read(element);
	return {
		id: requireId(attrs),
		name: attrs.string("name"),
		comment: attrs.optionalString("comment"),
		definition: (attrs.optionalString("sqlDefinition") ?? "").replace(VIEW_HEADER_PATTERN, ""),
	};
}

function buildFigure(element: XmlElement): Figure | undefined {
	const structName = element.attributes["struct-name"];
	if (structName !== TABLE_FIGURE && structName !== VIEW_FIGURE) {
		return undefined;
	}

	const attrs = AttributeBag.read(element);
	const base = {
		id: requireId(attrs),
		layerId: attrs.optionalLink("layer"),
		left: attrs.real("left"),
		top: attrs.real("top"),
		color: attrs.optionalString("color"),
	};
	return structName === TABLE_FIGURE
		? { ...base, kind: "table", tableId: attrs.link("table") }
		: { ...base, kind: "view", viewId: attrs.link("view") };
}

function buildLayer(element: XmlElement): Layer {
	const attrs = AttributeBag.read(element);
	return {
		id: requireId(attrs),
		name: attrs.string("name"),
		left: attrs.real("left"),
		top: attrs.real("top"),
		color: attrs.optionalString("color"),
	};
}

function buildDiagram(element: XmlElement): Diagram {
	if (element.attributes["struct-name"] !== DIAGRAM_STRUCT) {
		throw new InputFormatError(
			ErrorCodes.MALFORMED_DOCUMENT,
			`Expected a ${DIAGRAM_STRUCT}, found ${element.attributes["struct-name"] ?? element.tag}`,
			{ id: element.attributes["id"] }
		);
	}

	const attrs = AttributeBag.read(element);
	requireChild(element, "value", { key: "connections" });
	const figures = requireChild(element, "value", { key: "figures" }).children
		.map(buildFigure)
		.filter((figure): figure is Figure => figure !== undefined);
	const layers = requireChild(element, "value", { key: "layers" }).children.map(buildLayer);

	return {
		id: requireId(attrs),
		name: attrs.string("name"),
		figures,
		layers,
	};
}
