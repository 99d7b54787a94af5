import * as fs from "fs";
import { unzipSync } from "fflate";
import { ErrorCodes, InputFormatError } from "./errors";

/**
 * Read a single entry from a zip container.
 * Only the requested entry is inflated.
 */
export function extractEntry(source: string | Uint8Array, innerName: string): Uint8Array {
	const label = typeof source === "string" ? source : "<buffer>";
	const bytes = typeof source === "string" ? readContainer(source) : source;

	let entries: Record<string, Uint8Array>;
	try {
		entries = unzipSync(bytes, { filter: (file) => file.name === innerName });
	} catch (err) {
		throw new InputFormatError(ErrorCodes.NOT_FOUND, `${label} is not a readable zip archive`, {
			path: label,
			cause: err instanceof Error ? err.message : String(err),
		});
	}

	const entry = entries[innerName];
	if (entry === undefined) {
		throw new InputFormatError(ErrorCodes.NOT_FOUND, `${innerName} not found in ${label}`, {
			path: label,
			entry: innerName,
		});
	}
	return entry;
}

function readContainer(path: string): Uint8Array {
	try {
		return fs.readFileSync(path);
	} catch (err) {
		throw new InputFormatError(ErrorCodes.NOT_FOUND, `Cannot read ${path}`, {
			path,
			cause: err instanceof Error ? err.message : String(err),
		});
	}
}
