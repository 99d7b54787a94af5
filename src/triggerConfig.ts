import * as fs from "fs";
import ini from "ini";
import { ConfigError, ErrorCodes } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export const TRIGGERS_SECTION = "Triggers";

/**
 * Trigger name -> fully qualified function signature, read from the
 * `[Triggers]` section of an INI file:
 *
 * ```ini
 * [Triggers]
 * orders_before_insert = public.check_order()
 * ```
 *
 * Trigger names are matched case-insensitively.
 */
export class TriggerConfig {
	private constructor(private readonly _signatures: ReadonlyMap<string, string>) { }

	static parse(text: string, source = "<string>", log: Logger = defaultLogger): TriggerConfig {
		const document: unknown = ini.parse(text);
		const signatures = new Map<string, string>();

		const section = isRecord(document) ? findSection(document) : undefined;
		if (section === undefined) {
			log.warn(`${source} has no [${TRIGGERS_SECTION}] section, no trigger will be converted`);
			return new TriggerConfig(signatures);
		}

		for (const [name, value] of Object.entries(section)) {
			if (typeof value !== "string" || value.trim() === "") {
				log.warn(`Ignoring trigger ${name} in ${source}: no function signature`);
				continue;
			}
			signatures.set(name.toLowerCase(), value.trim());
		}
		return new TriggerConfig(signatures);
	}

	static load(path: string, log: Logger = defaultLogger): TriggerConfig {
		let text: string;
		try {
			text = fs.readFileSync(path, "utf-8");
		} catch (err) {
			throw new ConfigError(ErrorCodes.TRIGGER_CONFIG_UNREADABLE, `Couldn't open trigger config file ${path}`, {
				path,
				cause: err instanceof Error ? err.message : String(err),
			});
		}
		return TriggerConfig.parse(text, path, log);
	}

	get size(): number {
		return this._signatures.size;
	}

	lookup(triggerName: string): string | undefined {
		return this._signatures.get(triggerName.toLowerCase());
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findSection(document: Record<string, unknown>): Record<string, unknown> | undefined {
	const section = document[TRIGGERS_SECTION];
	return isRecord(section) ? section : undefined;
}
