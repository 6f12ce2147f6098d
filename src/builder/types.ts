/**
 * Strips `readonly` from every property of T.
 */
export type Mutable<T> = {
	-readonly [K in keyof T]: T[K];
};

/**
 * Configuration step for reference-semantics values. Receives the instance itself.
 */
export type ConfigureSelf<T> = (self: T) => void;

/**
 * Configuration step for value-semantics values. Receives a writable copy.
 */
export type ConfigureDraft<T> = (draft: Mutable<T>) => void;

/**
 * Call shape of types configured in place.
 */
export interface Configurable {
	with(configure: ConfigureSelf<this>): this;
}

/**
 * Call shape of types configured through a copy.
 */
export interface ValueConfigurable {
	with(configure: ConfigureDraft<this>): this;
}
