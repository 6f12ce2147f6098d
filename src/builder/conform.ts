import { withSelf } from "./builder.js";
import { valueType } from "./copy.js";
import type { ConfigureDraft, ConfigureSelf } from "./types.js";
import { withCopy } from "./value-builder.js";

type AnyClass = abstract new (...args: Array<never>) => object;

function installWith(target: AnyClass, method: (this: object, configure: never) => object): void {
	const prototype: object = target.prototype;
	Object.defineProperty(prototype, "with", {
		configurable: true,
		value: method,
		writable: true,
	});
}

/**
 * Adds an in-place `with` to an existing class and all of its subclasses.
 * Pair it with `interface Target extends Configurable {}` for the types.
 */
export function conformBuilder<C extends AnyClass>(target: C): C {
	installWith(target, function (this: object, configure: ConfigureSelf<object>): object {
		return withSelf(this, configure);
	});
	return target;
}

/**
 * Adds a copying `with` to an existing class and marks its instances as value types.
 * Pair it with `interface Target extends ValueConfigurable {}` for the types.
 */
export function conformValueBuilder<C extends AnyClass>(target: C): C {
	installWith(target, function (this: object, configure: ConfigureDraft<object>): object {
		return withCopy(this, configure);
	});
	const prototype: object = target.prototype;
	Object.defineProperty(prototype, valueType, { configurable: true, value: true });
	return target;
}
