import { checkConstraintElement, commentElement, INTEGER_TYPES } from "./dbmElements";
import { ErrorCodes, SynthesisError } from "./errors";
import type { Column, Table } from "./model";
import type { SynthesisContext } from "./synthesisContext";
import { createElement, type XmlElement } from "./xml";

interface TypeMapping {
	readonly type: string;
	readonly withTimezone?: boolean;
	readonly length?: number;
}

const TYPE_MAP: Readonly<Record<string, TypeMapping>> = {
	SMALLINT: { type: "smallint" },
	JSON: { type: "json" },
	DECIMAL: { type: "decimal" },
	VARCHAR: { type: "varchar" },
	BIGINT: { type: "bigint" },
	DATE: { type: "date" },
	CHAR: { type: "char" },
	INT: { type: "integer" },
	FLOAT: { type: "real" },
	DOUBLE: { type: "double precision" },
	TIMESTAMP: { type: "timestamp with time zone", withTimezone: true },
	TIMESTAMP_F: { type: "timestamp with time zone", withTimezone: true },
	DATETIME: { type: "timestamp with time zone", withTimezone: true },
	DATETIME_F: { type: "timestamp with time zone", withTimezone: true },
	TIME: { type: "time with time zone", withTimezone: true },
	TINYTEXT: { type: "varchar", length: 255 },
	TEXT: { type: "varchar", length: 65535 },
	MEDIUMTEXT: { type: "text" },
	LONGTEXT: { type: "text" },
};

/** User type names under which TINYINT means a boolean. */
export const BOOLEAN_ALIASES: readonly string[] = ["UBOOL", "BOOLEAN", "BOOL"];

export const FALLBACK_TYPE = "smallint";

const UNSIGNED = "UNSIGNED";
const ON_UPDATE_DEFAULT = "CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP";
const VERBATIM_DEFAULTS: readonly string[] = ["TRUE", "FALSE", "CURRENT_TIMESTAMP"];

export interface ColumnMapping {
	readonly element: XmlElement;
	/** Table level check constraints the column needs */
	readonly constraints: readonly XmlElement[];
}

/** Destination type name plus its attributes, in emission order. */
interface ResolvedType {
	name: string;
	attributes: Map<string, string>;
}

/**
 * Map one non foreign key column to a pgModeler `column` element.
 * Enumeration types and domains the column needs are appended to the
 * document root through the context, ahead of the owning table.
 */
export function mapColumn(ctx: SynthesisContext, table: Table, column: Column): ColumnMapping {
	const label = `${table.name}.${column.name}`;
	const constraints: XmlElement[] = [];
	const flags = [...column.flags];
	const resolved = resolveBaseType(ctx, column, label);

	const attributes: Record<string, string> = { name: column.name };
	if (column.isNotNull) {
		attributes["not-null"] = "true";
	}
	if (column.autoIncrement && INTEGER_TYPES.includes(resolved.name)) {
		attributes["identity-type"] = "ALWAYS";
		if (table.nextAutoInc !== undefined) {
			attributes["start"] = table.nextAutoInc;
		}
	}

	const defaultValue = mapDefaultValue(ctx, table, column, resolved.name, label);
	if (defaultValue !== undefined) {
		attributes["default-value"] = defaultValue;
	}

	applyNumericSpec(ctx, column, resolved, flags, label);

	for (const flag of flags) {
		if (flag !== UNSIGNED) {
			ctx.log.warn(`Unsupported flag ${flag} on ${label}`);
		} else if (INTEGER_TYPES.includes(resolved.name)) {
			if (column.autoIncrement) {
				ctx.log.info(`Identity column ${label} cannot use an unsigned domain, keeping ${resolved.name}`);
			} else {
				resolved.name = `public.u${resolved.name}`;
			}
		} else {
			constraints.push(checkConstraintElement(`${table.name}_${column.name}_ge0`, table.name, `${column.name} >= 0`));
		}
	}

	if (ctx.citext && (resolved.name === "varchar" || resolved.name === "char")) {
		const operator = resolved.name === "char" ? "=" : "<=";
		const length = resolved.attributes.get("length") ?? "0";
		constraints.push(
			checkConstraintElement(`${table.name}_${column.name}_len`, table.name, `length(${column.name}) ${operator} ${length}`)
		);
		resolved.name = "citext";
		resolved.attributes.delete("length");
	}

	const element = createElement("column", attributes, [
		createElement("type", { name: resolved.name, ...Object.fromEntries(resolved.attributes) }),
	]);
	if (column.comment !== undefined) {
		element.children.push(commentElement(column.comment));
	}
	return { element, constraints };
}

function resolveBaseType(ctx: SynthesisContext, column: Column, label: string): ResolvedType {
	const attributes = new Map([["length", "0"]]);
	const category = column.type.category;

	if (category === "TINYINT") {
		const isBoolean = column.type.kind === "user" && column.type.name !== undefined && BOOLEAN_ALIASES.includes(column.type.name);
		return { name: isBoolean ? "boolean" : "smallint", attributes };
	}

	if (category === "ENUM") {
		const values = parseEnumValues(column.datatypeExplicitParams, label);
		return { name: ctx.addEnum(column.name, values), attributes };
	}

	const mapping = Object.hasOwn(TYPE_MAP, category) ? TYPE_MAP[category] : undefined;
	if (mapping === undefined) {
		ctx.log.warn(`Unknown type ${category} on ${label}, using ${FALLBACK_TYPE}`);
		return { name: FALLBACK_TYPE, attributes };
	}
	if (mapping.length !== undefined) {
		attributes.set("length", String(mapping.length));
	}
	if (mapping.withTimezone) {
		attributes.set("with-timezone", "true");
	}
	return { name: mapping.type, attributes };
}

/**
 * Parse an enum literal list such as `('a', 'b')`.
 */
export function parseEnumValues(params: string | undefined, label = "column"): string[] {
	const list = (params ?? "").trim();
	if (!list.startsWith("(") || !list.endsWith(")")) {
		throw new SynthesisError(ErrorCodes.INVALID_ENUM_LITERAL, `Enum values of ${label} must be a parenthesized list: ${JSON.stringify(list)}`, {
			column: label,
			params,
		});
	}
	return list.slice(1, -1).split(",").map((item) => {
		const literal = item.trim();
		if (literal.length < 2 || !literal.startsWith("'") || !literal.endsWith("'")) {
			throw new SynthesisError(ErrorCodes.INVALID_ENUM_LITERAL, `Enum value of ${label} is not a quoted literal: ${literal}`, {
				column: label,
				literal,
			});
		}
		return literal.slice(1, -1).trim();
	});
}

function mapDefaultValue(
	ctx: SynthesisContext,
	table: Table,
	column: Column,
	typeName: string,
	label: string
): string | undefined {
	const value = column.defaultValue;
	if (column.defaultValueIsNull) {
		ctx.log.warn(`Unsupported NULL default on ${label}`);
		return undefined;
	}
	if (value === undefined) {
		return undefined;
	}

	if (value === "1" || value === "0") {
		if (typeName !== "boolean") return value;
		return value === "1" ? "TRUE" : "FALSE";
	}
	if (VERBATIM_DEFAULTS.includes(value) || (value.length >= 2 && value.startsWith("'") && value.endsWith("'"))) {
		return value;
	}
	if (value === ON_UPDATE_DEFAULT) {
		ctx.addUpdateTimestamp(table.name, column.name);
		return "CURRENT_TIMESTAMP";
	}

	ctx.log.warn(`Unknown default value ${value} on ${label}, passing it through`);
	return value;
}

/**
 * Length, precision and scale are exclusive: a length, a precision with a
 * scale (fixed point), or a precision alone (a range domain for integers).
 * Unset values are negative.
 */
function applyNumericSpec(
	ctx: SynthesisContext,
	column: Column,
	resolved: ResolvedType,
	flags: string[],
	label: string
): void {
	const { length, precision, scale } = column;
	const invalid = (reason: string) =>
		new SynthesisError(ErrorCodes.INVALID_NUMERIC_SPEC, `Column ${label} ${reason}`, {
			column: label,
			type: resolved.name,
			length,
			precision,
			scale,
		});

	if (length > 0) {
		if (precision > 0 || scale > 0) {
			throw invalid("combines a length with a precision or scale");
		}
		if (resolved.attributes.get("length") !== "0") {
			throw invalid(`declares a length on a ${column.type.category} column`);
		}
		resolved.attributes.set("length", String(length));
		return;
	}

	if (precision > 0) {
		if (scale >= 0) {
			if (resolved.attributes.get("length") !== "0") {
				throw invalid(`declares a precision on a ${column.type.category} column`);
			}
			resolved.attributes.set("length", String(precision));
			resolved.attributes.set("precision", String(scale));
			return;
		}
		applyPrecision(ctx, column, resolved, flags, label);
		return;
	}

	if (scale > 0) {
		throw invalid("declares a scale without a precision");
	}
}

function applyPrecision(
	ctx: SynthesisContext,
	column: Column,
	resolved: ResolvedType,
	flags: string[],
	label: string
): void {
	const precision = column.precision;

	if (resolved.attributes.has("with-timezone")) {
		resolved.attributes.set("precision", String(precision));
		return;
	}
	if (resolved.name === "boolean") {
		return;
	}
	if (!INTEGER_TYPES.includes(resolved.name)) {
		resolved.attributes.set("length", String(precision));
		return;
	}
	if (column.autoIncrement) {
		ctx.log.info(`Identity column ${label} cannot use a range domain, ignoring precision ${precision}`);
		return;
	}

	const unsigned = flags.includes(UNSIGNED);
	const digits = "9".repeat(precision);
	const name = `${unsigned ? "u" : ""}${resolved.name}${precision}`;
	resolved.name = ctx.ensureDomain(
		name,
		resolved.name,
		`range${precision}`,
		`VALUE >= ${unsigned ? "0" : `-${digits}`} AND VALUE <= ${digits}`
	);
	if (unsigned) {
		flags.splice(flags.indexOf(UNSIGNED), 1);
	}
}
