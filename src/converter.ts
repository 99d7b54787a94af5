import * as fs from "fs";
import * as path from "path";
import { extractEntry } from "./archive";
import { AttributeBag } from "./attributes";
import { resolveOptions, type ConversionOptions, type ResolvedOptions } from "./config";
import { ErrorCodes, InputFormatError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import { mergeFiles } from "./merge";
import { buildSchemaGraph } from "./schemaGraph";
import { synthesizeDbm, type SynthesisStats } from "./synthesizer";
import { TriggerConfig } from "./triggerConfig";
import { findChildren, parseXml, requireChild, serializeXml, type XmlElement } from "./xml";

export const MWB_INNER_FILE = "document.mwb.xml";
export const GRT_FORMAT = "2.0";
export const DOCUMENT_TYPE = "MySQL Workbench Model";
export const DBM_EXTENSION = ".dbm";

const DOCUMENT_STRUCT = "workbench.Document";
const PHYSICAL_MODEL_STRUCT = "workbench.physical.Model";

export interface ConversionResult {
	readonly outputPath: string;
	readonly stats: SynthesisStats;
	/** Functions and aggregates taken over from merged files */
	readonly merged: number;
}

/**
 * Parse the inner document of a Workbench archive and check its header.
 */
export function readWorkbenchDocument(bytes: Uint8Array | string): XmlElement {
	const root = parseXml(bytes);
	const format = root.attributes["grt_format"];
	if (format !== GRT_FORMAT) {
		throw new InputFormatError(
			ErrorCodes.UNSUPPORTED_FORMAT_VERSION,
			`Unsupported document format ${format ?? "(none)"}, expected ${GRT_FORMAT}`,
			{ grtFormat: format }
		);
	}
	const documentType = root.attributes["document_type"];
	if (documentType !== DOCUMENT_TYPE) {
		throw new InputFormatError(
			ErrorCodes.UNSUPPORTED_DOCUMENT_TYPE,
			`Unsupported document type ${documentType ?? "(none)"}, expected "${DOCUMENT_TYPE}"`,
			{ documentType }
		);
	}
	return root;
}

/**
 * The first `workbench.physical.Model` of the document.
 */
export function locatePhysicalModel(root: XmlElement, log: Logger = defaultLogger): XmlElement {
	const document = root.children[0];
	if (document === undefined || document.tag !== "value" || document.attributes["struct-name"] !== DOCUMENT_STRUCT) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, `The document root does not hold a ${DOCUMENT_STRUCT}`, {
			found: document?.attributes["struct-name"] ?? document?.tag,
		});
	}

	const models = findChildren(requireChild(document, "value", { key: "physicalModels" }), "value", {
		structName: PHYSICAL_MODEL_STRUCT,
	});
	if (models.length === 0) {
		throw new InputFormatError(ErrorCodes.MALFORMED_DOCUMENT, "The document has no physical model", {
			document: document.attributes["id"],
		});
	}
	if (models.length > 1) {
		const name = AttributeBag.read(models[0]).optionalString("name") ?? models[0].attributes["id"];
		log.info(`Document has ${models.length} physical models, using the first one (${name})`);
	}
	return models[0];
}

export interface ConvertDocumentOptions {
	readonly options: ResolvedOptions;
	readonly triggerConfig?: TriggerConfig;
	readonly logger?: Logger;
}

/**
 * Workbench document -> pgModeler document, without touching the file system.
 */
export function convertDocument(
	root: XmlElement,
	{ options, triggerConfig, logger = defaultLogger }: ConvertDocumentOptions
): { document: XmlElement; stats: SynthesisStats } {
	const model = locatePhysicalModel(root, logger);
	const graph = buildSchemaGraph(model, { logger: logger.child("model") });
	return synthesizeDbm(graph, {
		citext: options.citext,
		foreignKeyIndexes: options.foreignKeyIndexes,
		prefixIndexNames: options.prefixIndexNames,
		triggerConfig,
		logger: logger.child("synthesis"),
	});
}

/** `model.mwb` -> `model.dbm`, in the same directory. */
export function outputPathFor(sourcePath: string): string {
	const parsed = path.parse(sourcePath);
	return path.join(parsed.dir, parsed.name + DBM_EXTENSION);
}

/**
 * Convert a `.mwb` file. The output is only written once conversion and
 * merging have succeeded.
 */
export function convert(sourcePath: string, cliOptions: ConversionOptions = {}, log: Logger = defaultLogger): ConversionResult {
	const options = resolveOptions(cliOptions);
	const triggerConfig = options.triggers !== undefined ? TriggerConfig.load(options.triggers, log) : undefined;

	const root = readWorkbenchDocument(extractEntry(sourcePath, MWB_INNER_FILE));
	const { document, stats } = convertDocument(root, { options, triggerConfig, logger: log });
	const merged = mergeFiles(document, options.merge, log);

	const outputPath = options.output ?? outputPathFor(sourcePath);
	fs.writeFileSync(outputPath, serializeXml(document), "utf-8");
	log.debug(`Saved converted model as ${outputPath}`);

	return { outputPath, stats, merged };
}
