import { Color } from './color';
import { mapColumn } from './columnMapping';
import {
  citextExtensionElement,
  createDbModel,
  customIndexesElement,
  databaseElement,
  indexElement,
  INTEGER_TYPES,
  positionElement,
  primaryKeyElement,
  publicSchemaElement,
  relationshipElement,
  roleRef,
  schemaRef,
  tagElement,
  textboxElement,
  triggerElement,
} from './dbmElements';
import { ErrorCodes, ModelError, SynthesisError } from './errors';
import { logger as defaultLogger } from './logger';
import type { ForeignKey, Index, Layer, Table } from './model';
import type { SchemaGraph } from './schemaGraph';
import { SynthesisContext, type SynthesisOptions, type SynthesisStats } from './synthesisContext';
import type { TriggerConfig } from './triggerConfig';
import { createElement, type XmlElement } from './xml';

export type { SynthesisOptions, SynthesisStats } from './synthesisContext';

/** PostgreSQL's NAMEDATALEN - 1 */
export const MAX_IDENTIFIER_LENGTH = 63;

const INDEX_SUFFIX = '_idx';

/** pgModeler canvas units per Workbench unit */
export const POSITION_SCALE = { x: 1.8, y: 1.2 } as const;

const TITLE_SHADE = -40;
const FALLBACK_LAYER_COLOR = '#E1E1E1';

export interface SynthesisResult {
  readonly document: XmlElement;
  readonly stats: SynthesisStats;
}

/**
 * Synthesize a pgModeler document from a schema graph.
 *
 * Root element order is significant: database, schema, extension, layer
 * annotations, domains, then per table its enums/domains followed by the
 * table itself, then relationships, indexes, timestamp functions,
 * timestamp triggers and finally the configured source triggers.
 */
export function synthesizeDbm(graph: SchemaGraph, options: SynthesisOptions = {}): SynthesisResult {
  const log = options.logger ?? defaultLogger;
  const ctx = new SynthesisContext(createDbModel(), options.citext ?? true, log);
  const keepForeignKeyIndexes = options.foreignKeyIndexes ?? true;
  const prefixIndexNames = options.prefixIndexNames ?? true;

  ctx.append(databaseElement(graph.schemaName));
  ctx.append(publicSchemaElement());
  if (ctx.citext) {
    ctx.append(citextExtensionElement());
  }

  for (const layer of graph.diagram.layers) {
    emitLayer(ctx, graph, layer);
  }

  for (const type of INTEGER_TYPES) {
    ctx.ensureDomain(`u${type}`, type, 'ge0', 'VALUE >= 0');
  }

  const indexes: XmlElement[] = [];
  const sourceTriggers: XmlElement[] = [];
  const foreignKeys: ForeignKey[] = [];

  for (const table of graph.tables) {
    const tableElement = emitTable(ctx, graph, table);
    ctx.append(tableElement);
    ctx.stats.tables++;

    for (const index of table.indexes) {
      const emitted = emitIndex(graph, table, index, keepForeignKeyIndexes, prefixIndexNames);
      if (emitted === undefined) continue;
      if (index.indexType === 'PRIMARY') {
        tableElement.children.push(emitted);
      } else {
        indexes.push(emitted);
      }
    }

    foreignKeys.push(...table.foreignKeys);

    const customOrder = foreignKeyColumnPositions(graph, table);
    if (customOrder.size > 0) {
      tableElement.children.push(customIndexesElement('column', customOrder));
    }

    sourceTriggers.push(...emitSourceTriggers(ctx, table, options.triggerConfig));
  }

  for (const view of graph.views) {
    log.warn(`View "${view.name}" is not converted`);
  }

  // Identifying relationships first; sort is stable
  const ordered = [...foreignKeys].sort((a, b) => Number(b.primary) - Number(a.primary));
  for (const foreignKey of ordered) {
    const relationship = emitRelationship(ctx, graph, foreignKey);
    if (relationship) {
      ctx.append(relationship);
      ctx.stats.relationships++;
    }
  }

  for (const index of indexes) {
    ctx.append(index);
  }
  ctx.stats.indexes = indexes.length;

  for (const fn of ctx.updateFunctions) {
    ctx.append(fn);
  }
  for (const trigger of [...ctx.updateTriggers, ...sourceTriggers]) {
    ctx.append(trigger);
  }
  ctx.stats.functions = ctx.updateFunctions.length;
  ctx.stats.triggers = ctx.updateTriggers.length + sourceTriggers.length;

  return { document: ctx.root, stats: ctx.stats };
}

/**
 * Fit an index name into the identifier limit, optionally prefixing it
 * with its table name. Overlong names must end in `_idx`, which is kept.
 */
export function normalizeIndexName(indexName: string, tableName: string, prefix: boolean): string {
  const name = prefix && !indexName.includes(tableName) ? `${tableName}_${indexName}` : indexName;
  if (name.length <= MAX_IDENTIFIER_LENGTH) {
    return name;
  }
  if (!name.endsWith(INDEX_SUFFIX)) {
    throw new SynthesisError(
      ErrorCodes.IDENTIFIER_TOO_LONG,
      `Index name "${name}" exceeds ${MAX_IDENTIFIER_LENGTH} characters and does not end in ${INDEX_SUFFIX}`,
      { table: tableName, index: indexName, name, length: name.length }
    );
  }
  return name.slice(0, MAX_IDENTIFIER_LENGTH - INDEX_SUFFIX.length) + INDEX_SUFFIX;
}

export function scalePosition(left: number, top: number): { x: number; y: number } {
  return {
    x: Math.trunc(left * POSITION_SCALE.x),
    y: Math.trunc(top * POSITION_SCALE.y),
  };
}

function emitLayer(ctx: SynthesisContext, graph: SchemaGraph, layer: Layer): void {
  let colorText = graph.firstColoredTableFigure(layer)?.color;
  if (colorText === undefined) {
    colorText = layer.color ?? FALLBACK_LAYER_COLOR;
    ctx.log.warn(`Layer "${layer.name}" has no colored table figure, using ${colorText}`);
  }
  const color = Color.parse(colorText);
  const title = [color.toString(), color.toString(), color.shift(TITLE_SHADE).toString()];

  const position = scalePosition(layer.left, layer.top);
  ctx.append(textboxElement(layer.name, position.x, position.y));
  ctx.append(tagElement(layer.name.toLowerCase(), title, layer.name));
}

function emitTable(ctx: SynthesisContext, graph: SchemaGraph, table: Table): XmlElement {
  const element = createElement(
    'table',
    { name: table.name, layer: '0', 'collapse-mode': '2', 'max-obj-count': '0' },
    [schemaRef(), roleRef()]
  );

  const figure = graph.tableFigure(table);
  const layer = figure ? graph.figureLayer(figure) : undefined;
  if (layer) {
    element.children.push(createElement('tag', { name: layer.name.toLowerCase() }));
  }

  if (figure) {
    const position = scalePosition(figure.left + (layer?.left ?? 0), figure.top + (layer?.top ?? 0));
    element.children.push(positionElement(position.x, position.y));
  } else {
    ctx.log.warn(`Table "${table.name}" has no figure on the diagram, placing it at 0,0`);
    element.children.push(positionElement(0, 0));
  }

  const autoIncrement = table.columns.filter((c) => c.autoIncrement && !graph.isForeignKeyMember(c));
  if (autoIncrement.length > 1) {
    throw new SynthesisError(
      ErrorCodes.MULTIPLE_AUTO_INCREMENT,
      `Table "${table.name}" has more than one auto-increment column`,
      { table: table.name, columns: autoIncrement.map((c) => c.name) }
    );
  }

  const constraints: XmlElement[] = [];
  for (const column of table.columns) {
    // Relationships recreate foreign key columns
    if (graph.isForeignKeyMember(column)) continue;
    const mapping = mapColumn(ctx, table, column);
    element.children.push(mapping.element);
    constraints.push(...mapping.constraints);
  }
  element.children.push(...constraints);

  return element;
}

/** Original position -> name of every foreign key column of the table. */
function foreignKeyColumnPositions(graph: SchemaGraph, table: Table): Map<number, string> {
  const positions = new Map<number, string>();
  table.columns.forEach((column, position) => {
    if (graph.isForeignKeyMember(column)) {
      positions.set(position, column.name);
    }
  });
  return positions;
}

function emitIndex(
  graph: SchemaGraph,
  table: Table,
  index: Index,
  keepForeignKeyIndexes: boolean,
  prefixIndexNames: boolean
): XmlElement | undefined {
  const members = index.columns.map((indexColumn) => ({
    column: graph.indexColumnTarget(table, indexColumn),
    descend: indexColumn.descend,
  }));
  const ownColumns = members.filter((m) => !graph.isForeignKeyMember(m.column)).map((m) => m.column.name);

  const kept = index.indexType === 'UNIQUE' || (index.indexType === 'INDEX' && keepForeignKeyIndexes);
  if (ownColumns.length === 0 && !kept) {
    return undefined;
  }

  if (index.indexType === 'PRIMARY') {
    return primaryKeyElement(table.name, ownColumns);
  }

  return indexElement({
    name: normalizeIndexName(index.name, table.name, prefixIndexNames),
    table: table.name,
    unique: index.unique,
    columns: members.map((m) => ({ name: m.column.name, descend: m.descend })),
  });
}

function emitSourceTriggers(ctx: SynthesisContext, table: Table, config: TriggerConfig | undefined): XmlElement[] {
  if (table.triggers.length === 0) {
    return [];
  }
  if (!config) {
    ctx.log.warn(`Skipping ${table.triggers.length} trigger(s) of "${table.name}": no trigger configuration given`);
    return [];
  }

  const result: XmlElement[] = [];
  for (const trigger of table.triggers) {
    const signature = config.lookup(trigger.name);
    if (signature === undefined) {
      ctx.log.warn(`Trigger ${trigger.name} is not present in the trigger configuration, skipping`);
      continue;
    }
    result.push(
      triggerElement({
        name: trigger.name,
        firingType: trigger.timing,
        event: trigger.event,
        table: table.name,
        signature,
      })
    );
  }
  return result;
}

function emitRelationship(ctx: SynthesisContext, graph: SchemaGraph, foreignKey: ForeignKey): XmlElement | undefined {
  if (foreignKey.referencedTableId === undefined) {
    ctx.log.debug(`Foreign key ${foreignKey.name} references no table, skipping`);
    return undefined;
  }

  if (!foreignKey.many) {
    throw new SynthesisError(
      ErrorCodes.UNSUPPORTED_CARDINALITY,
      `Foreign key ${foreignKey.name} is not one-to-many`,
      { foreignKey: foreignKey.name }
    );
  }

  const referenced = graph.findTable(foreignKey.referencedTableId);
  const owner = graph.findTable(foreignKey.tableId);
  if (!referenced || !owner) {
    throw new ModelError(
      ErrorCodes.TABLE_NOT_FOUND,
      `Foreign key ${foreignKey.name} references unknown table ${referenced ? foreignKey.tableId : foreignKey.referencedTableId}`,
      { foreignKey: foreignKey.name, table: foreignKey.tableId, referencedTable: foreignKey.referencedTableId }
    );
  }

  if (foreignKey.columnIds.length !== 1) {
    throw new SynthesisError(
      ErrorCodes.MULTI_COLUMN_FOREIGN_KEY,
      `Foreign key ${foreignKey.name} has ${foreignKey.columnIds.length} columns, only single column keys are supported`,
      { foreignKey: foreignKey.name, table: owner.name, columns: foreignKey.columnIds.length }
    );
  }
  const column = owner.columns.find((c) => c.id === foreignKey.columnIds[0]);
  if (!column) {
    throw new ModelError(
      ErrorCodes.COLUMN_NOT_FOUND,
      `Column ${foreignKey.columnIds[0]} of foreign key ${foreignKey.name} not found in table "${owner.name}"`,
      { foreignKey: foreignKey.name, table: owner.name, column: foreignKey.columnIds[0] }
    );
  }

  return relationshipElement({
    name: foreignKey.name,
    sourceColumn: column.name,
    sourceTable: referenced.name,
    destinationTable: owner.name,
    required: foreignKey.mandatory && column.isNotNull,
    identifier: foreignKey.primary,
    updateAction: foreignKey.updateRule ?? 'NO ACTION',
    deleteAction: foreignKey.deleteRule ?? 'NO ACTION',
  });
}
