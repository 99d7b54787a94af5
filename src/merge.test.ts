import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ErrorCodes } from "./errors";
import { Logger } from "./logger";
import { loadDbm, mergeDbm, mergeFiles } from "./merge";
import { parseXml } from "./xml";

const FRAGMENT = [
	"<dbmodel>",
	'<function name="audit"/>',
	'<table name="ignored"/>',
	'<aggregate name="total"/>',
	"</dbmodel>",
].join("");

describe("mergeDbm", () => {
	test("inserts functions and aggregates before the first trigger", () => {
		const target = parseXml('<dbmodel><table name="t"/><trigger name="a"/><trigger name="b"/></dbmodel>');

		expect(mergeDbm(target, parseXml(FRAGMENT))).toBe(2);
		expect(target.children.map((c) => `${c.tag}:${c.attributes["name"]}`)).toEqual([
			"table:t",
			"function:audit",
			"aggregate:total",
			"trigger:a",
			"trigger:b",
		]);
	});

	test("appends when there is no trigger", () => {
		const target = parseXml('<dbmodel><table name="t"/></dbmodel>');

		mergeDbm(target, parseXml(FRAGMENT));
		expect(target.children.map((c) => c.tag)).toEqual(["table", "function", "aggregate"]);
	});
});

describe("loading merge files", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mwb2dbm-merge-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	test("merges every file in order", () => {
		const first = path.join(tempDir, "first.dbm");
		const second = path.join(tempDir, "second.dbm");
		fs.writeFileSync(first, FRAGMENT);
		fs.writeFileSync(second, '<?xml version="1.0"?>\n<dbmodel><function name="later"/></dbmodel>');
		const log = new Logger();
		log.setLevel("silent");
		const info = vi.spyOn(log, "info");

		const target = parseXml("<dbmodel/>");
		expect(mergeFiles(target, [first, second], log)).toBe(3);
		expect(target.children.map((c) => c.attributes["name"])).toEqual(["audit", "total", "later"]);
		expect(info).toHaveBeenCalledWith(`Merged 2 element(s) from ${first}`);
		expect(info).toHaveBeenCalledWith(`Merged 1 element(s) from ${second}`);
	});

	test("rejects files that are not pgModeler models", () => {
		const file = path.join(tempDir, "other.xml");
		fs.writeFileSync(file, "<data/>");

		expect(() => loadDbm(file)).toThrow(expect.objectContaining({ code: ErrorCodes.MALFORMED_DOCUMENT }));
	});

	test("rejects missing files", () => {
		expect(() => loadDbm(path.join(tempDir, "missing.dbm"))).toThrow(
			expect.objectContaining({ code: ErrorCodes.NOT_FOUND })
		);
	});
});
