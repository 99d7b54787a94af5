// Errors and logging
export { ConversionError, InputFormatError, ModelError, SynthesisError, ConfigError, ErrorCodes } from './errors';
export type { ErrorCode } from './errors';
export { Logger, logger } from './logger';
export type { LogLevel } from './logger';

// Collaborators
export type { XmlElement, ChildFilter } from './xml';
export { parseXml, serializeXml, createElement, createTextElement, findChild, findChildren } from './xml';
export { extractEntry } from './archive';
export { TriggerConfig } from './triggerConfig';

// Source model
export type {
  SimpleType,
  UserType,
  DataType,
  Column,
  Index,
  IndexColumn,
  IndexType,
  ForeignKey,
  Trigger,
  Table,
  View,
  Figure,
  TableFigure,
  ViewFigure,
  Layer,
  Diagram,
} from './model';
export { AttributeBag } from './attributes';
export type { AttributeValue, AttributeType } from './attributes';
export { TypeCatalog, normalizeCategory } from './typeCatalog';
export { SchemaGraph, buildSchemaGraph } from './schemaGraph';

// Synthesis
export type { SynthesisOptions, SynthesisStats, SynthesisResult } from './synthesizer';
export { synthesizeDbm, normalizeIndexName, MAX_IDENTIFIER_LENGTH } from './synthesizer';
export { parseEnumValues } from './columnMapping';
export { Color } from './color';
export { mergeDbm, mergeFiles, loadDbm } from './merge';

// Driver and configuration
export type { ConversionOptions, ResolvedOptions } from './config';
export { loadConfigFile, resolveOptions, validateOptions, CONFIG_FILE_NAME } from './config';
export type { ConversionResult } from './converter';
export { convert, convertDocument, readWorkbenchDocument, locatePhysicalModel, outputPathFor, MWB_INNER_FILE } from './converter';
