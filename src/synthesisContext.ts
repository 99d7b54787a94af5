import {
	domainElement,
	enumTypeElement,
	qualified,
	triggerElement,
	updateTimestampFunctionElement,
} from "./dbmElements";
import { ErrorCodes, SynthesisError } from "./errors";
import type { Logger } from "./logger";
import type { TriggerConfig } from "./triggerConfig";
import type { XmlElement } from "./xml";

export interface SynthesisOptions {
	/** Convert varchar/char to citext with a length check (default true) */
	readonly citext?: boolean;
	/** Keep non-unique indexes made only of foreign key columns (default true) */
	readonly foreignKeyIndexes?: boolean;
	/** Prefix index names with their table name (default true) */
	readonly prefixIndexNames?: boolean;
	readonly triggerConfig?: TriggerConfig;
	readonly logger?: Logger;
}

export interface SynthesisStats {
	tables: number;
	relationships: number;
	indexes: number;
	domains: number;
	enums: number;
	functions: number;
	triggers: number;
}

/**
 * Per-run synthesis state: the document root that domains and enums are
 * appended to as columns need them, the names already taken, and the
 * deferred timestamp-emulation functions and triggers.
 */
export class SynthesisContext {
	readonly stats: SynthesisStats = {
		tables: 0,
		relationships: 0,
		indexes: 0,
		domains: 0,
		enums: 0,
		functions: 0,
		triggers: 0,
	};

	private readonly _domains = new Set<string>();
	private readonly _enums = new Set<string>();
	private readonly _updateFunctions = new Map<string, XmlElement>();
	private readonly _updateTriggers: XmlElement[] = [];

	constructor(
		readonly root: XmlElement,
		readonly citext: boolean,
		readonly log: Logger
	) { }

	append(element: XmlElement): void {
		this.root.children.push(element);
	}

	/**
	 * Emit a check-constrained domain unless one with the same name exists.
	 * Returns the schema-qualified name.
	 */
	ensureDomain(name: string, baseType: string, constraintName: string, expression: string): string {
		if (!this._domains.has(name)) {
			this._domains.add(name);
			this.append(domainElement(name, baseType, constraintName, expression));
			this.stats.domains++;
		}
		return qualified(name);
	}

	/**
	 * Emit an enumeration type named after the column. A second enum for a
	 * column of the same name gets an ordinal: `enum_<n>_<column>`.
	 */
	addEnum(column: string, values: readonly string[]): string {
		let name = `enum_${column}`;
		if (this._enums.has(name)) {
			name = `enum_${this._enums.size + 1}_${column}`;
			if (this._enums.has(name)) {
				throw new SynthesisError(ErrorCodes.DUPLICATE_ENUM_NAME, `Cannot find a unique enum type name for column "${column}"`, {
					column,
					name,
				});
			}
		}
		this._enums.add(name);
		this.append(enumTypeElement(name, values));
		this.stats.enums++;
		return qualified(name);
	}

	/**
	 * Register ON UPDATE CURRENT_TIMESTAMP emulation for one column.
	 * The function is shared by every column with the same name.
	 */
	addUpdateTimestamp(table: string, column: string): void {
		const functionName = `update_${column}_on_update`;
		if (!this._updateFunctions.has(functionName)) {
			this._updateFunctions.set(functionName, updateTimestampFunctionElement(functionName, column));
		}
		this._updateTriggers.push(
			triggerElement({
				name: `${table}_t_update_${column}`,
				firingType: "BEFORE",
				event: "UPDATE",
				table,
				signature: `${qualified(functionName)}()`,
			})
		);
	}

	get updateFunctions(): readonly XmlElement[] {
		return [...this._updateFunctions.values()];
	}

	get updateTriggers(): readonly XmlElement[] {
		return this._updateTriggers;
	}
}
