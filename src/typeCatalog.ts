import { AttributeBag } from "./attributes";
import { ErrorCodes, InputFormatError, ModelError } from "./errors";
import type { DataType, SimpleType, UserType } from "./model";
import type { XmlElement } from "./xml";

export const NATIVE_TYPE_PATTERN = /^com\.mysql\.rdbms\.mysql\.datatype\.([a-z_]+)$/;

/**
 * Normalized category of a native type name: the upper-cased last segment.
 * `com.mysql.rdbms.mysql.datatype.varchar` gives `VARCHAR`.
 */
export function normalizeCategory(nativeType: string, context: Record<string, unknown> = {}): string {
	const match = NATIVE_TYPE_PATTERN.exec(nativeType);
	if (!match) {
		throw new ModelError(ErrorCodes.UNRECOGNIZED_NATIVE_TYPE, `Unrecognized native type "${nativeType}"`, {
			...context,
			nativeType,
		});
	}
	return match[1].toUpperCase();
}

/**
 * All data types declared by a catalog, indexed by identifier.
 * Simple types are registered first so that user types can resolve to them.
 */
export class TypeCatalog {
	private constructor(private readonly _types: ReadonlyMap<string, DataType>) { }

	/**
	 * @param simpleTypes the `simpleDatatypes` list: `<link>` elements holding native names
	 * @param userTypes the `userDatatypes` list: `<value>` elements with an `actualType` link
	 */
	static build(simpleTypes: XmlElement, userTypes: XmlElement): TypeCatalog {
		const types = new Map<string, DataType>();

		const register = (type: DataType) => {
			if (types.has(type.id)) {
				throw new ModelError(ErrorCodes.DUPLICATE_TYPE_ID, `Duplicate type identifier "${type.id}"`, {
					id: type.id,
				});
			}
			types.set(type.id, type);
		};

		for (const element of simpleTypes.children) {
			register(readSimpleType(element));
		}

		for (const element of userTypes.children) {
			register(readUserType(element, types));
		}

		return new TypeCatalog(types);
	}

	static fromTypes(types: Iterable<DataType>): TypeCatalog {
		return new TypeCatalog(new Map([...types].map((t) => [t.id, t])));
	}

	get size(): number {
		return this._types.size;
	}

	has(id: string): boolean {
		return this._types.has(id);
	}

	get(id: string): DataType {
		const type = this._types.get(id);
		if (!type) {
			throw new ModelError(ErrorCodes.TYPE_NOT_FOUND, `Type "${id}" is not declared in the catalog`, { id });
		}
		return type;
	}

	values(): IterableIterator<DataType> {
		return this._types.values();
	}
}

export function createSimpleType(nativeType: string): SimpleType {
	return {
		kind: "simple",
		id: nativeType,
		nativeType,
		category: normalizeCategory(nativeType),
	};
}

function readSimpleType(element: XmlElement): SimpleType {
	if (element.tag !== "link" || element.text === undefined) {
		throw new InputFormatError(
			ErrorCodes.MALFORMED_DOCUMENT,
			`Simple data types must be <link> elements holding a type name, found <${element.tag}>`,
			{ tag: element.tag }
		);
	}
	return createSimpleType(element.text);
}

function readUserType(element: XmlElement, known: ReadonlyMap<string, DataType>): UserType {
	const attrs = AttributeBag.read(element);
	if (element.tag !== "value" || attrs.id === undefined) {
		throw new InputFormatError(
			ErrorCodes.MALFORMED_DOCUMENT,
			`User data types must be <value> elements with an id, found <${element.tag}>`,
			{ tag: element.tag }
		);
	}

	const actualTypeId = attrs.optionalLink("actualType");
	if (actualTypeId === undefined) {
		throw new ModelError(ErrorCodes.KEY_NOT_FOUND, `User type ${attrs.id} has no actualType link`, {
			id: attrs.id,
			key: "actualType",
		});
	}

	const context = { userType: attrs.id, name: attrs.optionalString("name") };
	const category = normalizeCategory(actualTypeId, context);
	const actualType = known.get(actualTypeId);
	if (actualType === undefined || actualType.kind !== "simple") {
		throw new ModelError(
			ErrorCodes.TYPE_NOT_FOUND,
			`User type ${attrs.id} aliases "${actualTypeId}", which is not a declared simple type`,
			{ ...context, actualType: actualTypeId }
		);
	}

	return {
		kind: "user",
		id: attrs.id,
		nativeType: actualTypeId,
		category,
		name: attrs.optionalString("name"),
		sqlDefinition: attrs.optionalString("sqlDefinition"),
		actualType,
	};
}
