import { CopyError } from "./errors.js";

/**
 * How far `copyValue` descends into nested values.
 */
export type CopyMode = "deep" | "shallow";

/**
 * Method key under which a type provides its own copy.
 */
export const copy: unique symbol = Symbol("configuring-builder.copy");

/**
 * Prototype marker for classes whose instances have value semantics.
 */
export const valueType: unique symbol = Symbol("configuring-builder.valueType");

/**
 * A value that knows how to copy itself. The copy must share the source's prototype.
 */
export interface Copyable {
	[copy](): object;
}

function hasCopyHook(value: object): value is Copyable {
	return typeof Reflect.get(value, copy) === "function";
}

/**
 * Returns the constructor name of an object, or `Object` when it has none.
 */
export function typeNameOf(value: object): string {
	const constructor: unknown = Reflect.get(value, "constructor");
	if (typeof constructor === "function" && constructor.name !== "") {
		return constructor.name;
	}
	return "Object";
}

const viewConstructors = [
	Int8Array,
	Uint8Array,
	Uint8ClampedArray,
	Int16Array,
	Uint16Array,
	Int32Array,
	Uint32Array,
	Float32Array,
	Float64Array,
	BigInt64Array,
	BigUint64Array,
	DataView,
];

// Built-ins whose state lives in internal slots or private fields.
const opaqueConstructors = [
	WeakMap,
	WeakSet,
	WeakRef,
	FinalizationRegistry,
	Promise,
	URL,
	URLSearchParams,
];

const arrayIndexPattern = /^(?:0|[1-9]\d*)$/;

/**
 * Whether a nested value is copied along with its owner in deep mode.
 */
function hasValueSemantics(value: object): boolean {
	if (
		Array.isArray(value) ||
		ArrayBuffer.isView(value) ||
		value instanceof ArrayBuffer ||
		value instanceof SharedArrayBuffer ||
		value instanceof Date ||
		value instanceof Map ||
		value instanceof RegExp ||
		value instanceof Set ||
		hasCopyHook(value)
	) {
		return true;
	}
	const prototype: unknown = Object.getPrototypeOf(value);
	if (prototype === null || prototype === Object.prototype) {
		return true;
	}
	return valueType in value;
}

/**
 * Copies own property descriptors of source onto target, except the skipped keys.
 */
function copyProperties(
	source: object,
	target: object,
	mode: CopyMode,
	seen: Map<object, object>,
	skip: (key: string | symbol) => boolean = () => false,
): void {
	for (const key of Reflect.ownKeys(source)) {
		if (skip(key)) {
			continue;
		}
		const descriptor = Reflect.getOwnPropertyDescriptor(source, key);
		if (descriptor === undefined) {
			continue;
		}
		if (descriptor.get !== undefined || descriptor.set !== undefined) {
			Reflect.defineProperty(target, key, { ...descriptor, configurable: true });
			continue;
		}
		// Drafts stay writable even when the source was frozen.
		Reflect.defineProperty(target, key, {
			configurable: true,
			enumerable: descriptor.enumerable ?? true,
			value: copyEntry(descriptor.value, mode, seen, false),
			writable: true,
		});
	}
}

/**
 * Gives a copied built-in the source's prototype and own properties, so subclasses survive.
 */
function adopt(
	source: object,
	target: object,
	mode: CopyMode,
	seen: Map<object, object>,
	skip?: (key: string | symbol) => boolean,
): object {
	Object.setPrototypeOf(target, Object.getPrototypeOf(source));
	copyProperties(source, target, mode, seen, skip);
	return target;
}

function copyView(value: ArrayBufferView): object {
	const bytes = value.buffer.slice(value.byteOffset, value.byteOffset + value.byteLength);
	const base = viewConstructors.find((constructor) => value instanceof constructor);
	if (base === undefined) {
		throw new CopyError(typeNameOf(value), `Cannot copy ${typeNameOf(value)}: unknown buffer view.`);
	}
	const target: object = Reflect.construct(base, [bytes]);
	Object.setPrototypeOf(target, Object.getPrototypeOf(value));
	return target;
}

function copyEntry(value: unknown, mode: CopyMode, seen: Map<object, object>, root: boolean): unknown {
	if (typeof value !== "object" || value === null) {
		return value;
	}
	const existing = seen.get(value);
	if (existing !== undefined) {
		return existing;
	}
	if (!root && (mode === "shallow" || !hasValueSemantics(value))) {
		return value;
	}

	if (hasCopyHook(value)) {
		const copied = value[copy]();
		if (Object.getPrototypeOf(copied) !== Object.getPrototypeOf(value)) {
			throw new CopyError(typeNameOf(value));
		}
		seen.set(value, copied);
		return copied;
	}

	if (Array.isArray(value)) {
		const target = new Array<unknown>(value.length);
		seen.set(value, target);
		for (let index = 0; index < value.length; index += 1) {
			if (index in value) {
				target[index] = copyEntry(value[index], mode, seen, false);
			}
		}
		Object.setPrototypeOf(target, Object.getPrototypeOf(value));
		copyProperties(
			value,
			target,
			mode,
			seen,
			(key) => key === "length" || (typeof key === "string" && arrayIndexPattern.test(key)),
		);
		return target;
	}

	if (ArrayBuffer.isView(value)) {
		const target = copyView(value);
		seen.set(value, target);
		return target;
	}

	if (value instanceof ArrayBuffer || value instanceof SharedArrayBuffer) {
		const target = value.slice(0);
		seen.set(value, target);
		Object.setPrototypeOf(target, Object.getPrototypeOf(value));
		return target;
	}

	if (value instanceof RegExp) {
		const target = new RegExp(value);
		target.lastIndex = value.lastIndex;
		seen.set(value, target);
		return adopt(value, target, mode, seen, (key) => key === "lastIndex");
	}

	if (value instanceof Date) {
		const target = new Date(value.getTime());
		seen.set(value, target);
		return adopt(value, target, mode, seen);
	}

	if (value instanceof Map) {
		const target = new Map<unknown, unknown>();
		seen.set(value, target);
		for (const [key, entry] of value) {
			target.set(key, copyEntry(entry, mode, seen, false));
		}
		return adopt(value, target, mode, seen);
	}

	if (value instanceof Set) {
		const target = new Set<unknown>();
		seen.set(value, target);
		for (const entry of value) {
			target.add(copyEntry(entry, mode, seen, false));
		}
		return adopt(value, target, mode, seen);
	}

	if (opaqueConstructors.some((constructor) => value instanceof constructor)) {
		const typeName = typeNameOf(value);
		throw new CopyError(
			typeName,
			`Cannot copy ${typeName}: its state is not held in properties. Give it a [copy]() method.`,
		);
	}

	const target: object = Object.create(Object.getPrototypeOf(value));
	seen.set(value, target);
	copyProperties(value, target, mode, seen);
	return target;
}

/**
 * Copies a value, keeping the prototype of every copied object.
 *
 * In deep mode nested plain data, collections and value types are copied too;
 * nested class instances without the value marker are shared.
 */
export function copyValue<T>(value: T, mode: CopyMode = "deep"): T {
	return copyEntry(value, mode, new Map(), true) as T;
}
