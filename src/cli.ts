import { Command } from "commander";
import { loadConfigFile, resolveOptions, type ConversionOptions } from "./config";
import { convert, type ConversionResult } from "./converter";
import { ConversionError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export interface CliFlags {
	triggers?: string;
	merge?: string[];
	nocitext?: boolean;
	nofkidx?: boolean;
	prefixIndexNames?: boolean;
	output?: string;
	config?: string;
	verbose?: boolean;
	quiet?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value];
}

/**
 * Only flags given on the command line are set, so that the configuration
 * file can supply the rest.
 */
export function toConversionOptions(flags: CliFlags): ConversionOptions {
	return {
		citext: flags.nocitext ? false : undefined,
		foreignKeyIndexes: flags.nofkidx ? false : undefined,
		prefixIndexNames: flags.prefixIndexNames,
		triggers: flags.triggers,
		merge: flags.merge,
		output: flags.output,
		logLevel: flags.verbose ? "debug" : flags.quiet ? "warn" : undefined,
	};
}

function printResult(result: ConversionResult): void {
	const { stats } = result;
	console.log(`Saved converted file as ${result.outputPath}`);
	console.log(
		`  ${stats.tables} table(s), ${stats.relationships} relationship(s), ${stats.indexes} index(es), ` +
		`${stats.domains} domain(s), ${stats.enums} enum(s), ${stats.triggers} trigger(s)`
	);
	if (result.merged > 0) {
		console.log(`  ${result.merged} merged function(s)`);
	}
}

export function createProgram(log: Logger = defaultLogger): Command {
	const program = new Command();

	program
		.name("mwb2dbm")
		.description("Convert a schema from MySQL Workbench to pgModeler format")
		.version("1.0.0")
		.argument("<mwb>", "the mwb source")
		.option("--triggers <file>", "use this triggers definition file to create triggers in the resulting dbm")
		.option("--merge <dbm>", "merge functions from this dbm into the result (repeatable)", collect)
		.option("--nocitext", "do not convert char to citext")
		.option("--nofkidx", "do not create indexes for foreign keys")
		.option("--prefix-index-names", "prefix index names with their table name")
		.option("--no-prefix-index-names", "keep index names as they are")
		.option("-o, --output <file>", "output path (defaults to the source path with a .dbm extension)")
		.option("--config <file>", "JSON configuration file (defaults to ./mwb2dbm.config.json)")
		.option("-v, --verbose", "log debug messages")
		.option("-q, --quiet", "only log warnings and errors")
		.action((source: string, flags: CliFlags) => {
			try {
				const options = resolveOptions(toConversionOptions(flags), loadConfigFile(flags.config));
				log.setLevel(options.logLevel);
				printResult(convert(source, options, log));
			} catch (err) {
				if (err instanceof ConversionError) {
					program.error(`${err.code}: ${err.message}`, { exitCode: 1, code: err.code });
				}
				throw err;
			}
		});

	return program;
}
