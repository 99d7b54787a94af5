import * as fs from "fs";
import * as path from "path";
import Ajv from "ajv";
import { ConfigError, ErrorCodes } from "./errors";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger";

export const CONFIG_FILE_NAME = "mwb2dbm.config.json";

export interface ConversionOptions {
	readonly citext?: boolean;
	readonly foreignKeyIndexes?: boolean;
	readonly prefixIndexNames?: boolean;
	/** Trigger definition INI file */
	readonly triggers?: string;
	/** pgModeler files whose functions are merged into the result */
	readonly merge?: readonly string[];
	readonly output?: string;
	readonly logLevel?: LogLevel;
}

export interface ResolvedOptions {
	readonly citext: boolean;
	readonly foreignKeyIndexes: boolean;
	readonly prefixIndexNames: boolean;
	readonly triggers: string | undefined;
	readonly merge: readonly string[];
	readonly output: string | undefined;
	readonly logLevel: LogLevel;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
	citext: true,
	foreignKeyIndexes: true,
	prefixIndexNames: true,
	triggers: undefined,
	merge: [],
	output: undefined,
	logLevel: "info",
};

export const CONFIG_SCHEMA = {
	$schema: "http://json-schema.org/draft-07/schema#",
	title: "mwb2dbm configuration",
	type: "object",
	properties: {
		citext: { type: "boolean", description: "Convert varchar/char columns to citext" },
		foreignKeyIndexes: { type: "boolean", description: "Keep indexes made only of foreign key columns" },
		prefixIndexNames: { type: "boolean", description: "Prefix index names with the table name" },
		triggers: { type: "string", minLength: 1 },
		merge: { type: "array", items: { type: "string", minLength: 1 } },
		output: { type: "string", minLength: 1 },
		logLevel: { type: "string", enum: LOG_LEVEL_NAMES },
	},
	additionalProperties: false,
} as const;

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<ConversionOptions>(CONFIG_SCHEMA);

/**
 * Check a parsed configuration object; every violation is reported.
 */
export function validateOptions(value: unknown, source = "configuration"): ConversionOptions {
	if (validate(value)) {
		return value;
	}
	const problems = (validate.errors ?? []).map((error) => {
		const at = error.instancePath === "" ? "/" : error.instancePath;
		const extra = error.keyword === "additionalProperties" ? ` (${JSON.stringify(error.params["additionalProperty"])})` : "";
		return `${at} ${error.message ?? "is invalid"}${extra}`;
	});
	throw new ConfigError(ErrorCodes.INVALID_CONFIG, `Invalid ${source}: ${problems.join("; ")}`, {
		source,
		problems,
	});
}

/**
 * Read the project configuration file.
 *
 * An explicit path must exist. Without one, `mwb2dbm.config.json` in `cwd`
 * is used when present. Relative file paths inside the configuration are
 * resolved against the configuration file's directory.
 */
export function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): ConversionOptions {
	const configPath = explicitPath !== undefined ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILE_NAME);
	if (!fs.existsSync(configPath)) {
		if (explicitPath !== undefined) {
			throw new ConfigError(ErrorCodes.CONFIG_NOT_FOUND, `Configuration file ${configPath} not found`, {
				path: configPath,
			});
		}
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(ErrorCodes.INVALID_CONFIG, `Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`, {
			path: configPath,
		});
	}

	const options = validateOptions(parsed, configPath);
	const base = path.dirname(configPath);
	const resolve = (file: string) => path.resolve(base, file);
	return {
		...options,
		triggers: options.triggers !== undefined ? resolve(options.triggers) : undefined,
		merge: options.merge?.map(resolve),
		output: options.output !== undefined ? resolve(options.output) : undefined,
	};
}

/**
 * Command line options win over the configuration file, which wins over
 * the defaults.
 */
export function resolveOptions(cli: ConversionOptions, file: ConversionOptions = {}): ResolvedOptions {
	return {
		citext: cli.citext ?? file.citext ?? DEFAULT_OPTIONS.citext,
		foreignKeyIndexes: cli.foreignKeyIndexes ?? file.foreignKeyIndexes ?? DEFAULT_OPTIONS.foreignKeyIndexes,
		prefixIndexNames: cli.prefixIndexNames ?? file.prefixIndexNames ?? DEFAULT_OPTIONS.prefixIndexNames,
		triggers: cli.triggers ?? file.triggers ?? DEFAULT_OPTIONS.triggers,
		merge: cli.merge ?? file.merge ?? DEFAULT_OPTIONS.merge,
		output: cli.output ?? file.output ?? DEFAULT_OPTIONS.output,
		logLevel: cli.logLevel ?? file.logLevel ?? DEFAULT_OPTIONS.logLevel,
	};
}
