/**
 * Error raised when a value cannot be copied into an instance of its own type.
 */
export class CopyError extends Error {
	public readonly typeName: string;

	public constructor(typeName: string, message?: string) {
		super(message ?? `Copy of ${typeName} did not produce a ${typeName} instance.`);
		this.name = "CopyError";
		this.typeName = typeName;
	}
}
