/**
 * Typed source model read from a MySQL Workbench document.
 *
 * Design principle: immutable, readonly records. Cross references are by
 * identifier; back references (which foreign key or index a column belongs
 * to) live in the SchemaGraph lookup tables, not on the records.
 */

// === Data Types ===

/** A built-in type, identified by its native name. */
export interface SimpleType {
  readonly kind: 'simple';
  readonly id: string;
  readonly nativeType: string;
  /** Upper-cased last segment of the native name, e.g. VARCHAR */
  readonly category: string;
}

/** A named alias (e.g. BOOL) of exactly one built-in type. */
export interface UserType {
  readonly kind: 'user';
  readonly id: string;
  readonly nativeType: string;
  readonly category: string;
  /** Symbolic name, e.g. UBOOL */
  readonly name: string | undefined;
  readonly sqlDefinition: string | undefined;
  readonly actualType: SimpleType;
}

export type DataType = SimpleType | UserType;

// === Tables ===

export interface Column {
  readonly id: string;
  readonly tableId: string;
  readonly name: string;
  readonly isNotNull: boolean;
  readonly autoIncrement: boolean;
  readonly defaultValue: string | undefined;
  readonly defaultValueIsNull: boolean;
  readonly length: number;
  readonly precision: number;
  readonly scale: number;
  readonly datatypeExplicitParams: string | undefined;
  readonly comment: string | undefined;
  readonly flags: readonly string[];
  readonly type: DataType;
}

export const INDEX_TYPES = ['PRIMARY', 'UNIQUE', 'INDEX'] as const;

export type IndexType = (typeof INDEX_TYPES)[number];

export interface IndexColumn {
  readonly id: string;
  readonly indexId: string;
  readonly columnId: string;
  readonly descend: boolean;
}

export interface Index {
  readonly id: string;
  readonly tableId: string;
  readonly name: string;
  readonly indexType: IndexType;
  readonly isPrimary: boolean;
  readonly unique: boolean;
  readonly columns: readonly IndexColumn[];
}

export interface ForeignKey {
  readonly id: string;
  readonly tableId: string;
  readonly name: string;
  /** Absent for index-only entries that reference nothing */
  readonly referencedTableId: string | undefined;
  readonly many: boolean;
  readonly mandatory: boolean;
  readonly updateRule: string | undefined;
  readonly deleteRule: string | undefined;
  readonly columnIds: readonly string[];
  /** True if any member column is part of the primary key */
  readonly primary: boolean;
}

export interface Trigger {
  readonly id: string;
  readonly tableId: string;
  readonly name: string;
  /** BEFORE or AFTER */
  readonly timing: string;
  /** INSERT, UPDATE or DELETE */
  readonly event: string;
}

export interface Table {
  readonly id: string;
  readonly name: string;
  readonly nextAutoInc: string | undefined;
  readonly columns: readonly Column[];
  readonly indexes: readonly Index[];
  readonly foreignKeys: readonly ForeignKey[];
  readonly triggers: readonly Trigger[];
}

export interface View {
  readonly id: string;
  readonly name: string;
  readonly comment: string | undefined;
  /** Select statement with the leading CREATE VIEW ... AS removed */
  readonly definition: string;
}

// === Diagram ===

export const TABLE_FIGURE = 'workbench.physical.TableFigure';
export const VIEW_FIGURE = 'workbench.physical.ViewFigure';

interface FigureBase {
  readonly id: string;
  readonly layerId: string | undefined;
  readonly left: number;
  readonly top: number;
  readonly color: string | undefined;
}

export interface TableFigure extends FigureBase {
  readonly kind: 'table';
  readonly tableId: string;
}

export interface ViewFigure extends FigureBase {
  readonly kind: 'view';
  readonly viewId: string;
}

export type Figure = TableFigure | ViewFigure;

export interface Layer {
  readonly id: string;
  readonly name: string;
  readonly left: number;
  readonly top: number;
  readonly color: string | undefined;
}

export interface Diagram {
  readonly id: string;
  readonly name: string;
  readonly figures: readonly Figure[];
  readonly layers: readonly Layer[];
}

// === Back references ===

export interface IndexMembership {
  readonly index: Index;
  readonly indexColumn: IndexColumn;
}

export interface ColumnLinks {
  readonly foreignKey: ForeignKey | undefined;
  readonly indexes: readonly IndexMembership[];
}
