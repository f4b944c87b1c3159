export class AssertError extends Error {
	constructor(
		message: string,
		public readonly props?: Record<string, unknown>,
	) {
		super(message)
	}
}

export function assert(
	condition: unknown,
	message = "assertion failed",
	props?: Record<string, unknown>,
): asserts condition {
	if (!condition) {
		throw new AssertError(message, props)
	}
}

export function signalInvalidType(type: never): never {
	console.error(type)
	throw new TypeError("internal error: invalid type")
}

export const isUint32 = (value: number) => Number.isInteger(value) && value >= 0 && value <= 0xffffffff
