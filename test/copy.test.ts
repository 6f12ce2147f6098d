import { describe, expect, it } from "vitest";
import { copy, copyValue, CopyError, valueType, withCopy } from "../src/index.js";

class Connection {
	public open = true;
}

class Ledger {
	readonly #entries: Array<string>;

	public constructor(entries: Array<string> = []) {
		this.#entries = entries;
	}

	public get entries(): ReadonlyArray<string> {
		return this.#entries;
	}

	public record(entry: string): void {
		this.#entries.push(entry);
	}

	public [copy](): Ledger {
		return new Ledger([...this.#entries]);
	}
}

class Broken {
	public [copy](): object {
		return {};
	}
}

class Registry extends Map<string, number> {
	public label = "registry";
}

class Flags extends Set<string> {}

class Tags extends Array<string> {}

class Samples extends Float64Array {}

interface ListNode {
	name: string;
	next?: ListNode;
}

describe("copyValue", () => {
	it("returns primitives as they are", () => {
		expect(copyValue(5)).toBe(5);
		expect(copyValue("five")).toBe("five");
		expect(copyValue(null)).toBeNull();
	});

	it("copies nested plain data in deep mode", () => {
		const source = { meta: { count: 1 }, tags: ["a"] };

		const copied = copyValue(source);

		expect(copied).toEqual(source);
		expect(copied).not.toBe(source);
		expect(copied.meta).not.toBe(source.meta);
		expect(copied.tags).not.toBe(source.tags);
	});

	it("copies only the root in shallow mode", () => {
		const source = { meta: { count: 1 }, tags: ["a"] };

		const copied = copyValue(source, "shallow");

		expect(copied).not.toBe(source);
		expect(copied.meta).toBe(source.meta);
		expect(copied.tags).toBe(source.tags);
	});

	it("shares nested class instances without the value marker", () => {
		const connection = new Connection();
		const source = { connection, retries: 2 };

		const copied = copyValue(source);

		expect(copied.connection).toBe(connection);
	});

	it("copies nested instances of classes carrying the value marker", () => {
		class Money {
			public amount = 10;
		}
		Object.defineProperty(Money.prototype, valueType, { value: true });
		const source = { price: new Money() };

		const copied = copyValue(source);

		expect(copied.price).not.toBe(source.price);
		expect(copied.price).toBeInstanceOf(Money);
		expect(copied.price.amount).toBe(10);
	});

	it("copies dates, maps and sets into new containers", () => {
		const source = {
			at: new Date(0),
			index: new Map([["a", { n: 1 }]]),
			seen: new Set([1, 2]),
		};

		const copied = copyValue(source);

		expect(copied.at).not.toBe(source.at);
		expect(copied.at.getTime()).toBe(0);
		expect(copied.index).not.toBe(source.index);
		expect(copied.index.get("a")).not.toBe(source.index.get("a"));
		expect(copied.index.get("a")).toEqual({ n: 1 });
		expect(copied.seen).not.toBe(source.seen);
		expect([...copied.seen]).toEqual([1, 2]);
	});

	it("preserves cycles", () => {
		const node: ListNode = { name: "a" };
		node.next = node;

		const copied = copyValue(node);

		expect(copied).not.toBe(node);
		expect(copied.next).toBe(copied);
	});

	it("keeps the prototype of class instances", () => {
		const copied = copyValue(new Connection());

		expect(copied).toBeInstanceOf(Connection);
		expect(copied.open).toBe(true);
	});

	it("copies symbol-keyed properties", () => {
		const key = Symbol("key");
		const source = { [key]: { n: 1 } };

		const copied = copyValue(source);

		expect(copied[key]).toEqual({ n: 1 });
		expect(copied[key]).not.toBe(source[key]);
	});

	it("makes data properties of frozen sources writable on the copy", () => {
		const source = Object.freeze({ id: 0 });

		const copied = copyValue(source);

		expect(Object.isFrozen(copied)).toBe(false);
		expect(Object.getOwnPropertyDescriptor(copied, "id")?.writable).toBe(true);
	});

	it("delegates to a custom copy hook", () => {
		const ledger = new Ledger(["a"]);

		const configured = withCopy(ledger, (draft) => {
			draft.record("b");
		});

		expect(configured).toBeInstanceOf(Ledger);
		expect(configured.entries).toEqual(["a", "b"]);
		expect(ledger.entries).toEqual(["a"]);
	});

	it("rejects a custom copy that changes the type", () => {
		expect(() => copyValue(new Broken())).toThrowError(CopyError);
		expect(() => copyValue(new Broken())).toThrowError(
			"Copy of Broken did not produce a Broken instance.",
		);
	});
});

describe("copyValue with built-in subclasses", () => {
	it("keeps Map subclasses and their own fields", () => {
		const registry = new Registry();

		const configured = withCopy(registry, (draft) => {
			draft.set("a", 1);
			draft.label = "copied";
		});

		expect(configured).toBeInstanceOf(Registry);
		expect(configured.get("a")).toBe(1);
		expect(configured.label).toBe("copied");
		expect(registry.size).toBe(0);
		expect(registry.label).toBe("registry");
	});

	it("keeps Set subclasses", () => {
		const flags = new Flags(["a"]);

		const copied = copyValue(flags);

		expect(copied).toBeInstanceOf(Flags);
		expect(copied).not.toBe(flags);
		expect([...copied]).toEqual(["a"]);
	});

	it("keeps Array subclasses", () => {
		const tags = new Tags();
		tags.push("a");

		const copied = copyValue(tags);

		expect(copied).toBeInstanceOf(Tags);
		expect(copied).not.toBe(tags);
		expect([...copied]).toEqual(["a"]);
	});

	it("keeps holes in sparse arrays", () => {
		const source = [1, , 3];

		const copied = copyValue(source);

		expect(copied).toHaveLength(3);
		expect(1 in copied).toBe(false);
		expect(copied[2]).toBe(3);
	});
});

describe("copyValue with slot-backed built-ins", () => {
	it("copies typed arrays into usable typed arrays", () => {
		const bytes = new Uint8Array([1, 2]);

		const configured = withCopy(bytes, (draft) => {
			draft[0] = 9;
		});

		expect(configured).toBeInstanceOf(Uint8Array);
		expect(configured.length).toBe(2);
		expect([...configured]).toEqual([9, 2]);
		expect([...bytes]).toEqual([1, 2]);
	});

	it("copies only the viewed bytes of a typed array subclass", () => {
		const buffer = new Float64Array([1, 2, 3]).buffer;
		const samples = new Samples(buffer, 8, 2);

		const copied = copyValue(samples);

		expect(copied).toBeInstanceOf(Samples);
		expect([...copied]).toEqual([2, 3]);
		expect(copied.buffer).not.toBe(buffer);
		expect(copied.buffer.byteLength).toBe(16);
	});

	it("copies data views and array buffers", () => {
		const buffer = new ArrayBuffer(4);
		const view = new DataView(buffer);
		view.setUint8(0, 7);

		const copiedView = copyValue(view);
		const copiedBuffer = copyValue(buffer);
		view.setUint8(0, 8);

		expect(copiedView).toBeInstanceOf(DataView);
		expect(copiedView.getUint8(0)).toBe(7);
		expect(copiedBuffer.byteLength).toBe(4);
		expect(new Uint8Array(copiedBuffer)[0]).toBe(7);
	});

	it("copies regular expressions with their flags and position", () => {
		const pattern = /ab+c/gi;
		pattern.lastIndex = 1;

		const copied = copyValue(pattern);

		expect(copied).not.toBe(pattern);
		expect(copied.source).toBe("ab+c");
		expect(copied.flags).toBe("gi");
		expect(copied.lastIndex).toBe(1);
		expect(copied.test("xABBC")).toBe(true);
		expect(pattern.lastIndex).toBe(1);
	});

	it("rejects built-ins whose state cannot be copied", () => {
		expect(() => copyValue(new WeakMap())).toThrowError(CopyError);
		expect(() => copyValue(new WeakMap())).toThrowError(
			"Cannot copy WeakMap: its state is not held in properties. Give it a [copy]() method.",
		);
		expect(() => copyValue(new URL("https://example.test/"))).toThrowError(CopyError);
	});

	it("shares nested slot-backed built-ins in deep mode", () => {
		const cache = new WeakMap<object, number>();
		const source = { cache };

		const copied = copyValue(source);

		expect(copied.cache).toBe(cache);
	});
});

describe("copyValue property descriptors", () => {
	it("copies own accessors as descriptors and keeps enumerability", () => {
		const written: Array<string> = [];
		const source = { id: 1 };
		Object.defineProperty(source, "label", {
			enumerable: true,
			get: () => "one",
			set: (next: string) => {
				written.push(next);
			},
		});
		Object.defineProperty(source, "secret", {
			enumerable: false,
			value: { n: 1 },
			writable: false,
		});
		const sourceLabel = Object.getOwnPropertyDescriptor(source, "label");
		const sourceSecret = Object.getOwnPropertyDescriptor(source, "secret");

		const copied = copyValue(source);
		Reflect.set(copied, "label", "two");

		const label = Object.getOwnPropertyDescriptor(copied, "label");
		expect(label?.get).toBe(sourceLabel?.get);
		expect(label?.set).toBe(sourceLabel?.set);
		expect(label?.enumerable).toBe(true);
		expect(Reflect.get(copied, "label")).toBe("one");
		expect(written).toEqual(["two"]);

		const secret = Object.getOwnPropertyDescriptor(copied, "secret");
		expect(secret?.enumerable).toBe(false);
		expect(secret?.writable).toBe(true);
		expect(secret?.value).toEqual({ n: 1 });
		expect(secret?.value).not.toBe(sourceSecret?.value);
		expect(Object.keys(copied)).toEqual(["id", "label"]);
	});
});
