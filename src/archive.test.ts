import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { zipSync } from "fflate";
import { extractEntry } from "./archive";
import { ErrorCodes } from "./errors";

describe("extractEntry", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mwb2dbm-archive-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	const archive = zipSync({
		"document.mwb.xml": new TextEncoder().encode("<data/>"),
		"@db/data.db": new Uint8Array([1, 2, 3]),
	});

	test("reads the named entry from bytes", () => {
		expect(new TextDecoder().decode(extractEntry(archive, "document.mwb.xml"))).toBe("<data/>");
	});

	test("reads the named entry from a file", () => {
		const file = path.join(tempDir, "model.mwb");
		fs.writeFileSync(file, archive);
		expect(Array.from(extractEntry(file, "@db/data.db"))).toEqual([1, 2, 3]);
	});

	test("a missing entry is NotFound", () => {
		expect(() => extractEntry(archive, "other.xml")).toThrow("other.xml not found in <buffer>");
	});

	test("a file that is not a zip is NotFound", () => {
		const file = path.join(tempDir, "model.mwb");
		fs.writeFileSync(file, "plain text");
		expect(() => extractEntry(file, "document.mwb.xml")).toThrow(
			expect.objectContaining({ code: ErrorCodes.NOT_FOUND, details: expect.objectContaining({ path: file }) })
		);
	});

	test("an unreadable path is NotFound", () => {
		expect(() => extractEntry(path.join(tempDir, "missing.mwb"), "document.mwb.xml")).toThrow(
			expect.objectContaining({ code: ErrorCodes.NOT_FOUND })
		);
	});
});
