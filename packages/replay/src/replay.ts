import { logger } from "@libp2p/logger"

import type { ByteSource, CanvasInit, PlacementEvent } from "./interface.js"
import type { Snapshot } from "./Snapshot.js"
import { CanvasState } from "./CanvasState.js"
import { CutRequest, CutSchedule, createCutSchedule } from "./CutSchedule.js"
import { EmptyStreamError } from "./errors.js"
import { decodeRecords } from "./RecordDecoder.js"

export interface ReplayInit extends CanvasInit {
	cut: CutRequest
	/** timestamps that are never emitted as cut points; their events are still applied */
	exclude?: Iterable<number>
	/** defaults to true; when false, a stream without events throws EmptyStreamError */
	allowEmpty?: boolean
}

/**
 * A single forward pass over a stream of placement events.
 *
 * Each replay owns its own canvas. Snapshots are emitted in ascending
 * timestamp order, and a snapshot at T reflects every event with
 * timestamp <= T and none later.
 */
export class Replay {
	public static fromBytes(source: ByteSource, init: ReplayInit): Replay {
		const { width, height, palette } = init
		return new Replay(decodeRecords(source, { width, height, palette }), init)
	}

	public eventCount = 0
	public firstTimestamp: number | null = null
	public lastTimestamp: number | null = null
	public emitted = 0

	readonly #log = logger("pixel-replay:replay")
	readonly #canvas: CanvasState
	readonly #schedule: CutSchedule
	readonly #allowEmpty: boolean
	#started = false
	#done = false

	public constructor(
		private readonly events: AsyncIterable<PlacementEvent> | Iterable<PlacementEvent>,
		init: ReplayInit,
	) {
		this.#canvas = new CanvasState(init)
		this.#schedule = createCutSchedule(init.cut, { exclude: init.exclude })
		this.#allowEmpty = init.allowEmpty ?? true
	}

	/** Explicit targets that were never reached; only meaningful once the replay has finished */
	public get missing(): number[] {
		return this.#done ? this.#schedule.pending() : []
	}

	public async *snapshots(): AsyncGenerator<Snapshot> {
		if (this.#started) {
			throw new Error("replay has already been started")
		}

		this.#started = true

		let previous: number | null = null
		for await (const event of this.events) {
			if (event.timestamp !== previous) {
				yield* this.#emit(previous, event.timestamp)
			}

			this.#canvas.apply(event)
			this.eventCount++
			this.firstTimestamp ??= event.timestamp
			this.lastTimestamp = event.timestamp
			previous = event.timestamp
		}

		yield* this.#emit(previous, null)
		this.#done = true

		this.#log("applied %d events, emitted %d snapshots", this.eventCount, this.emitted)

		if (this.eventCount === 0 && !this.#allowEmpty) {
			throw new EmptyStreamError()
		}
	}

	*#emit(previous: number | null, upcoming: number | null): Iterable<Snapshot> {
		for (const target of this.#schedule.due(previous, upcoming)) {
			this.#log.trace("emitting snapshot %d at %d", this.emitted, target)
			yield this.#canvas.snapshot(target, this.emitted++)
		}
	}
}

/** Replay a diff byte stream */
export function replay(source: ByteSource, init: ReplayInit): AsyncGenerator<Snapshot> {
	return Replay.fromBytes(source, init).snapshots()
}

/** Replay an already-decoded event sequence */
export function replayEvents(
	events: AsyncIterable<PlacementEvent> | Iterable<PlacementEvent>,
	init: ReplayInit,
): AsyncGenerator<Snapshot> {
	return new Replay(events, init).snapshots()
}
