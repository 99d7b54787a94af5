import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILE_NAME, DEFAULT_OPTIONS, loadConfigFile, resolveOptions, validateOptions } from "./config";
import { ConfigError, ErrorCodes } from "./errors";

function configErrorOf(fn: () => unknown): ConfigError {
	try {
		fn();
	} catch (err) {
		if (err instanceof ConfigError) return err;
		throw err;
	}
	throw new Error("expected a ConfigError");
}

describe("validateOptions", () => {
	test("accepts a valid configuration", () => {
		const options = { citext: false, merge: ["functions.dbm"], logLevel: "warn" };
		expect(validateOptions(options)).toEqual(options);
	});

	test("reports every problem", () => {
		const err = configErrorOf(() => validateOptions({ citext: "yes", logLevel: "loud", extra: 1 }));

		expect(err.code).toBe(ErrorCodes.INVALID_CONFIG);
		expect(err.details).toEqual({
			source: "configuration",
			problems: expect.arrayContaining([
				"/citext must be boolean",
				"/logLevel must be equal to one of the allowed values",
				'/ must NOT have additional properties ("extra")',
			]),
		});
	});
});

describe("loadConfigFile", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mwb2dbm-config-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	test("is empty without a configuration file", () => {
		expect(loadConfigFile(undefined, tempDir)).toEqual({});
	});

	test("reads the default file and resolves paths against it", () => {
		fs.writeFileSync(
			path.join(tempDir, CONFIG_FILE_NAME),
			JSON.stringify({ citext: false, triggers: "triggers.ini", merge: ["functions.dbm"], output: "out/model.dbm" })
		);

		expect(loadConfigFile(undefined, tempDir)).toEqual({
			citext: false,
			triggers: path.join(tempDir, "triggers.ini"),
			merge: [path.join(tempDir, "functions.dbm")],
			output: path.join(tempDir, "out", "model.dbm"),
		});
	});

	test("resolves an explicit path against the working directory", () => {
		fs.mkdirSync(path.join(tempDir, "conf"));
		fs.writeFileSync(path.join(tempDir, "conf", "custom.json"), JSON.stringify({ triggers: "triggers.ini" }));

		expect(loadConfigFile("conf/custom.json", tempDir).triggers).toBe(path.join(tempDir, "conf", "triggers.ini"));
	});

	test("fails on a missing explicit file", () => {
		expect(configErrorOf(() => loadConfigFile("missing.json", tempDir)).code).toBe(ErrorCodes.CONFIG_NOT_FOUND);
	});

	test("fails on broken JSON", () => {
		fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), "{ citext: ");
		expect(configErrorOf(() => loadConfigFile(undefined, tempDir)).code).toBe(ErrorCodes.INVALID_CONFIG);
	});
});

describe("resolveOptions", () => {
	test("defaults", () => {
		expect(resolveOptions({})).toEqual(DEFAULT_OPTIONS);
	});

	test("command line wins over the file", () => {
		const resolved = resolveOptions(
			{ citext: true, output: "cli.dbm" },
			{ citext: false, foreignKeyIndexes: false, output: "file.dbm", logLevel: "debug" }
		);

		expect(resolved).toEqual({
			citext: true,
			foreignKeyIndexes: false,
			prefixIndexNames: true,
			triggers: undefined,
			merge: [],
			output: "cli.dbm",
			logLevel: "debug",
		});
	});
});
