import * as fs from "fs";
import { ErrorCodes, InputFormatError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import { parseXml, type XmlElement } from "./xml";

/** Element kinds taken over from a merged fragment. */
export const MERGED_TAGS: readonly string[] = ["function", "aggregate"];

/**
 * Splice the functions and aggregates of `fragment` into `target`, right
 * before the first trigger so every trigger can call them. Other elements
 * of the fragment are ignored. Returns the number of merged elements.
 */
export function mergeDbm(target: XmlElement, fragment: XmlElement): number {
	const merged = fragment.children.filter((child) => MERGED_TAGS.includes(child.tag));
	const firstTrigger = target.children.findIndex((child) => child.tag === "trigger");
	if (firstTrigger === -1) {
		target.children.push(...merged);
	} else {
		target.children.splice(firstTrigger, 0, ...merged);
	}
	return merged.length;
}

export function loadDbm(path: string): XmlElement {
	let text: string;
	try {
		text = fs.readFileSync(path, "utf-8");
	} catch (err) {
		throw new InputFormatError(ErrorCodes.NOT_FOUND, `Cannot read ${path}`, {
			path,
			cause: err instanceof Error ? err.message : String(err),
		});
	}
	const root = parseXml(text);
	if (root.tag !== "dbmodel") {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `${path} is not a pgModeler model (root <${root.tag}>)`, {
			path,
			root: root.tag,
		});
	}
	return root;
}

/**
 * Merge every listed `.dbm` file into `target`, in order.
 */
export function mergeFiles(target: XmlElement, paths: readonly string[], log: Logger = defaultLogger): number {
	let total = 0;
	for (const path of paths) {
		const count = mergeDbm(target, loadDbm(path));
		log.info(`Merged ${count} element(s) from ${path}`);
		total += count;
	}
	return total;
}
