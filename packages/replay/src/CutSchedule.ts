import { InvalidCutRequestError } from "./errors.js"
import { signalInvalidType } from "./utils.js"

export type CutRequest =
	| { type: "latest" }
	| { type: "interval"; interval: number }
	| { type: "timestamps"; timestamps: Iterable<number> }

export interface CutSchedule {
	/**
	 * Yields, in ascending order, every target settled by a canvas that holds all
	 * events with timestamp <= `previous` and none with timestamp >= `upcoming`.
	 * `previous` is null before the first event and `upcoming` is null once the
	 * stream has ended; at the end only targets <= `previous` are yielded.
	 */
	due(previous: number | null, upcoming: number | null): Iterable<number>

	/** Targets that have not been yielded yet, where these are known in advance */
	pending(): number[]
}

export class ExplicitSchedule implements CutSchedule {
	readonly #targets: number[]
	#cursor = 0

	public constructor(timestamps: Iterable<number>) {
		this.#targets = Array.from(new Set(timestamps)).sort((a, b) => a - b)
	}

	public *due(previous: number | null, upcoming: number | null): Iterable<number> {
		while (this.#cursor < this.#targets.length) {
			const target = this.#targets[this.#cursor]
			if (upcoming !== null ? target < upcoming : previous !== null && target <= previous) {
				this.#cursor++
				yield target
			} else {
				break
			}
		}
	}

	public pending(): number[] {
		return this.#targets.slice(this.#cursor)
	}
}

export class IntervalSchedule implements CutSchedule {
	#next: number | null = null

	public constructor(public readonly interval: number) {}

	public *due(previous: number | null, upcoming: number | null): Iterable<number> {
		if (this.#next === null) {
			if (upcoming === null) {
				return
			}

			// targets are anchored at the first event
			this.#next = upcoming
		}

		while (upcoming !== null ? this.#next < upcoming : previous !== null && this.#next <= previous) {
			const target = this.#next
			this.#next += this.interval
			yield target
		}
	}

	public pending(): number[] {
		return []
	}
}

/** Emits after every distinct event timestamp */
export class EveryTimestampSchedule implements CutSchedule {
	public *due(previous: number | null, upcoming: number | null): Iterable<number> {
		if (previous !== null && (upcoming === null || previous < upcoming)) {
			yield previous
		}
	}

	public pending(): number[] {
		return []
	}
}

export class LatestSchedule implements CutSchedule {
	public *due(previous: number | null, upcoming: number | null): Iterable<number> {
		if (previous !== null && upcoming === null) {
			yield previous
		}
	}

	public pending(): number[] {
		return []
	}
}

/** Drops excluded targets from another schedule */
class ExcludingSchedule implements CutSchedule {
	public constructor(
		private readonly schedule: CutSchedule,
		private readonly exclude: ReadonlySet<number>,
	) {}

	public *due(previous: number | null, upcoming: number | null): Iterable<number> {
		for (const target of this.schedule.due(previous, upcoming)) {
			if (!this.exclude.has(target)) {
				yield target
			}
		}
	}

	public pending(): number[] {
		return this.schedule.pending().filter((target) => !this.exclude.has(target))
	}
}

const isTimestamp = (value: number) => Number.isSafeInteger(value) && value >= 0

/**
 * `exclude` only filters generated targets (latest and interval cuts);
 * timestamps the caller names explicitly are always honored.
 */
export function createCutSchedule(request: CutRequest, options: { exclude?: Iterable<number> } = {}): CutSchedule {
	const schedule = createBaseSchedule(request)
	const exclude = new Set(options.exclude ?? [])
	if (request.type === "timestamps" || exclude.size === 0) {
		return schedule
	}

	return new ExcludingSchedule(schedule, exclude)
}

function createBaseSchedule(request: CutRequest): CutSchedule {
	if (request.type === "latest") {
		return new LatestSchedule()
	} else if (request.type === "interval") {
		const { interval } = request
		if (interval === Infinity) {
			return new LatestSchedule()
		} else if (!isTimestamp(interval)) {
			throw new InvalidCutRequestError(`interval must be a non-negative integer, got ${interval}`)
		} else if (interval === 0) {
			return new EveryTimestampSchedule()
		} else {
			return new IntervalSchedule(interval)
		}
	} else if (request.type === "timestamps") {
		const timestamps = Array.from(request.timestamps)
		for (const timestamp of timestamps) {
			if (!isTimestamp(timestamp)) {
				throw new InvalidCutRequestError(`timestamps must be non-negative integers, got ${timestamp}`)
			}
		}

		return new ExplicitSchedule(timestamps)
	} else {
		signalInvalidType(request)
	}
}
