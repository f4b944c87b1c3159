export class MalformedRecordError extends Error {
	public static code = "MALFORMED_RECORD"
	public readonly code = MalformedRecordError.code

	constructor(
		public readonly offset: number,
		public readonly reason: string,
	) {
		super(`malformed record at byte offset ${offset}: ${reason}`)
	}
}

export class UnknownColorCodeError extends Error {
	public static code = "UNKNOWN_COLOR_CODE"
	public readonly code = UnknownColorCodeError.code

	constructor(
		public readonly color: number,
		public readonly offset: number | null = null,
	) {
		super(
			offset === null
				? `unknown color code ${color}`
				: `unknown color code ${color} in record at byte offset ${offset}`,
		)
	}
}

export class EmptyStreamError extends Error {
	public static code = "EMPTY_STREAM"
	public readonly code = EmptyStreamError.code

	constructor() {
		super("no placement events in stream")
	}
}

export class InvalidCutRequestError extends Error {
	public static code = "INVALID_CUT_REQUEST"
	public readonly code = InvalidCutRequestError.code

	constructor(public readonly reason: string) {
		super(`invalid cut request: ${reason}`)
	}
}
