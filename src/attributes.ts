import { ErrorCodes, ModelError } from "./errors";
import type { XmlElement } from "./xml";

/**
 * One decoded `<value>`/`<link>` child of a source element.
 * Lists and dicts are recognized but never populated.
 */
export type AttributeValue =
	| { readonly type: "string"; readonly value: string | undefined }
	| { readonly type: "int"; readonly value: number }
	| { readonly type: "real"; readonly value: number }
	| { readonly type: "object"; readonly value: string | undefined }
	| { readonly type: "list" }
	| { readonly type: "dict" };

export type AttributeType = AttributeValue["type"];

const ATTRIBUTE_TAGS = new Set(["value", "link"]);

/**
 * Ordered, typed view over the attribute children of one source element.
 *
 * Entities read their fields through the typed accessors; each accessor
 * fails with a ModelError naming the element and the key, so a broken
 * source model can be located without extra instrumentation.
 */
export class AttributeBag {
	private constructor(
		readonly id: string | undefined,
		readonly structName: string | undefined,
		private readonly _values: ReadonlyMap<string, AttributeValue>
	) { }

	/**
	 * Decode the direct `value`/`link` children carrying both `key` and `type`.
	 */
	static read(element: XmlElement): AttributeBag {
		const id = element.attributes["id"];
		const structName = element.attributes["struct-name"];
		const values = new Map<string, AttributeValue>();

		for (const child of element.children) {
			if (!ATTRIBUTE_TAGS.has(child.tag)) continue;
			const key = child.attributes["key"];
			const type = child.attributes["type"];
			if (key === undefined || type === undefined) continue;

			if (values.has(key)) {
				throw new ModelError(ErrorCodes.DUPLICATE_KEY, `Duplicate attribute "${key}" in ${describe(structName, id)}`, {
					id,
					structName,
					key,
				});
			}
			values.set(key, decodeValue(key, type, child.text === "" ? undefined : child.text, structName, id));
		}

		return new AttributeBag(id, structName, values);
	}

	get description(): string {
		return describe(this.structName, this.id);
	}

	get size(): number {
		return this._values.size;
	}

	has(key: string): boolean {
		return this._values.has(key);
	}

	keys(): string[] {
		return [...this._values.keys()];
	}

	get(key: string): AttributeValue {
		const value = this._values.get(key);
		if (value === undefined) {
			throw new ModelError(ErrorCodes.KEY_NOT_FOUND, `Attribute "${key}" not found in ${this.description}`, {
				id: this.id,
				structName: this.structName,
				key,
			});
		}
		return value;
	}

	/** A string attribute that must be present and non-empty. */
	string(key: string): string {
		const value = this.optionalString(key);
		if (value === undefined) {
			throw this._invalid(key, "is empty");
		}
		return value;
	}

	/** A string attribute; a missing key and an empty value both read as undefined. */
	optionalString(key: string): string | undefined {
		if (!this.has(key)) return undefined;
		const attribute = this.get(key);
		if (attribute.type !== "string") {
			throw this._wrongType(key, "string", attribute.type);
		}
		return attribute.value;
	}

	int(key: string): number {
		const attribute = this.get(key);
		if (attribute.type !== "int") {
			throw this._wrongType(key, "int", attribute.type);
		}
		return attribute.value;
	}

	real(key: string): number {
		const attribute = this.get(key);
		if (attribute.type === "real" || attribute.type === "int") {
			return attribute.value;
		}
		throw this._wrongType(key, "real", attribute.type);
	}

	/** An int attribute used as a boolean (0/1). */
	flag(key: string): boolean {
		return this.int(key) !== 0;
	}

	/** The identifier held by an object link. */
	link(key: string): string {
		const value = this.optionalLink(key);
		if (value === undefined) {
			throw this._invalid(key, "is an empty link");
		}
		return value;
	}

	optionalLink(key: string): string | undefined {
		if (!this.has(key)) return undefined;
		const attribute = this.get(key);
		if (attribute.type !== "object") {
			throw this._wrongType(key, "object", attribute.type);
		}
		return attribute.value;
	}

	/** Any scalar rendered as text: used for fields stored as either string or int. */
	optionalText(key: string): string | undefined {
		if (!this.has(key)) return undefined;
		const attribute = this.get(key);
		switch (attribute.type) {
			case "string":
			case "object":
				return attribute.value;
			case "int":
			case "real":
				return String(attribute.value);
			case "list":
			case "dict":
				throw this._wrongType(key, "scalar", attribute.type);
		}
	}

	private _invalid(key: string, problem: string): ModelError {
		return new ModelError(ErrorCodes.INVALID_ATTRIBUTE_VALUE, `Attribute "${key}" of ${this.description} ${problem}`, {
			id: this.id,
			structName: this.structName,
			key,
		});
	}

	private _wrongType(key: string, expected: string, actual: AttributeType): ModelError {
		const code = actual === "list" || actual === "dict"
			? ErrorCodes.UNSUPPORTED_ATTRIBUTE_ACCESS
			: ErrorCodes.INVALID_ATTRIBUTE_VALUE;
		return new ModelError(code, `Attribute "${key}" of ${this.description} is ${actual}, expected ${expected}`, {
			id: this.id,
			structName: this.structName,
			key,
			expected,
			actual,
		});
	}
}

function decodeValue(
	key: string,
	type: string,
	text: string | undefined,
	structName: string | undefined,
	id: string | undefined
): AttributeValue {
	switch (type) {
		case "string":
			return { type: "string", value: text };
		case "object":
			return { type: "object", value: text };
		case "int": {
			if (text === undefined || !/^-?\d+$/.test(text.trim())) {
				throw invalidNumber(key, type, text, structName, id);
			}
			return { type: "int", value: Number.parseInt(text, 10) };
		}
		case "real": {
			const value = text === undefined ? Number.NaN : Number(text);
			if (!Number.isFinite(value)) {
				throw invalidNumber(key, type, text, structName, id);
			}
			return { type: "real", value };
		}
		case "list":
			return { type: "list" };
		case "dict":
			return { type: "dict" };
		default:
			throw new ModelError(
				ErrorCodes.UNSUPPORTED_ATTRIBUTE_TYPE,
				`Unsupported attribute type "${type}" for "${key}" in ${describe(structName, id)}`,
				{ id, structName, key, type }
			);
	}
}

function invalidNumber(
	key: string,
	type: string,
	text: string | undefined,
	structName: string | undefined,
	id: string | undefined
): ModelError {
	return new ModelError(
		ErrorCodes.INVALID_ATTRIBUTE_VALUE,
		`Attribute "${key}" in ${describe(structName, id)} is not a valid ${type}: ${JSON.stringify(text ?? null)}`,
		{ id, structName, key, type, text }
	);
}

function describe(structName: string | undefined, id: string | undefined): string {
	const name = structName ?? "element";
	return id ? `${name} ${id}` : name;
}
