/**
 * Error contract for the converter.
 * Every fatal condition is a ConversionError with a stable code and enough
 * details to locate the offending construct in the source model.
 */

export class ConversionError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
		public readonly details?: Record<string, unknown>
	) {
		super(message);
		this.name = "ConversionError";
		Error.captureStackTrace(this, this.constructor);
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			details: this.details,
		};
	}
}

/**
 * The source container or document does not have the expected shape.
 */
export class InputFormatError extends ConversionError {
	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(code, message, details);
		this.name = "InputFormatError";
	}
}

/**
 * Dangling references and broken invariants while building the schema graph.
 */
export class ModelError extends ConversionError {
	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(code, message, details);
		this.name = "ModelError";
	}
}

/**
 * Source constructs the destination model cannot express.
 */
export class SynthesisError extends ConversionError {
	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(code, message, details);
		this.name = "SynthesisError";
	}
}

/**
 * Configuration and trigger definition files.
 */
export class ConfigError extends ConversionError {
	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(code, message, details);
		this.name = "ConfigError";
	}
}

export const ErrorCodes = {
	// Input
	NOT_FOUND: "NotFound",
	INVALID_XML: "InvalidXml",
	UNSUPPORTED_FORMAT_VERSION: "UnsupportedFormatVersion",
	UNSUPPORTED_DOCUMENT_TYPE: "UnsupportedDocumentType",
	MALFORMED_DOCUMENT: "MalformedDocument",

	// Schema graph
	KEY_NOT_FOUND: "KeyNotFound",
	DUPLICATE_KEY: "DuplicateKey",
	UNSUPPORTED_ATTRIBUTE_TYPE: "UnsupportedAttributeType",
	UNSUPPORTED_ATTRIBUTE_ACCESS: "UnsupportedAttributeAccess",
	INVALID_ATTRIBUTE_VALUE: "InvalidAttributeValue",
	UNRECOGNIZED_NATIVE_TYPE: "UnrecognizedNativeType",
	DUPLICATE_TYPE_ID: "DuplicateTypeId",
	TYPE_NOT_FOUND: "TypeNotFound",
	AMBIGUOUS_COLUMN_TYPE: "AmbiguousColumnType",
	COLUMN_NOT_FOUND: "ColumnNotFound",
	DUPLICATE_FOREIGN_KEY_MEMBER: "DuplicateForeignKeyMember",
	DUPLICATE_INDEX_MEMBER: "DuplicateIndexMember",
	INVALID_INDEX_TYPE: "InvalidIndexType",
	TABLE_NOT_FOUND: "TableNotFound",
	INVALID_COLOR: "InvalidColor",

	// Synthesis
	INVALID_NUMERIC_SPEC: "InvalidNumericSpec",
	MULTIPLE_AUTO_INCREMENT: "MultipleAutoIncrement",
	MULTI_COLUMN_FOREIGN_KEY: "MultiColumnForeignKey",
	UNSUPPORTED_CARDINALITY: "UnsupportedCardinality",
	IDENTIFIER_TOO_LONG: "IdentifierTooLong",
	INVALID_ENUM_LITERAL: "InvalidEnumLiteral",
	DUPLICATE_ENUM_NAME: "DuplicateEnumName",

	// Configuration
	CONFIG_NOT_FOUND: "ConfigNotFound",
	INVALID_CONFIG: "InvalidConfig",
	TRIGGER_CONFIG_UNREADABLE: "TriggerConfigUnreadable",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
