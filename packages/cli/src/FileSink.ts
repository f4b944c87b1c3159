import fs from "node:fs"
import path from "node:path"

import { logger } from "@libp2p/logger"
import PQueue from "p-queue"

import type { Snapshot } from "@pixel-replay/replay"

import { SnapshotFormat, encodeSnapshot } from "./encoders.js"

export interface SnapshotSink {
	/** Queue a snapshot for persistence under `name`; resolves to its destination */
	write(name: string, snapshot: Snapshot): Promise<string>
	/** Wait for every queued snapshot to be persisted */
	close(): Promise<void>
}

export interface FileSinkInit {
	directory: string
	format: SnapshotFormat
	/** queued writes before `write` waits for the queue to drain */
	maxPending?: number
}

/**
 * Writes snapshots to `<directory>/<name>.<format>`, one at a time and in
 * the order they were handed over. Encoding and writing overlap with the
 * replay; `write` only waits once `maxPending` snapshots are queued.
 */
export class FileSink implements SnapshotSink {
	public readonly directory: string
	public readonly format: SnapshotFormat
	public readonly maxPending: number

	readonly #log = logger("pixel-replay:sink")
	readonly #queue = new PQueue({ concurrency: 1 })
	#failure: Error | null = null

	public constructor({ directory, format, maxPending = 8 }: FileSinkInit) {
		this.directory = path.resolve(directory)
		this.format = format
		this.maxPending = maxPending

		if (!fs.existsSync(this.directory)) {
			this.#log("creating directory %s", this.directory)
			fs.mkdirSync(this.directory, { recursive: true })
		}
	}

	public async write(name: string, snapshot: Snapshot): Promise<string> {
		this.#throwIfFailed()

		const file = path.resolve(this.directory, `${name}.${this.format}`)
		this.#queue
			.add(async () => {
				const data = encodeSnapshot(snapshot, this.format)
				await fs.promises.writeFile(file, data)
				this.#log("wrote snapshot %d to %s (%d bytes)", snapshot.index, file, data.byteLength)
			})
			.catch((err: unknown) => {
				this.#log.error("failed to write %s: %O", file, err)
				this.#failure ??= err instanceof Error ? err : new Error(String(err))
			})

		if (this.#queue.size >= this.maxPending) {
			await this.#queue.onSizeLessThan(this.maxPending)
		}

		return file
	}

	public async close(): Promise<void> {
		await this.#queue.onIdle()
		this.#throwIfFailed()
	}

	#throwIfFailed() {
		if (this.#failure !== null) {
			throw this.#failure
		}
	}
}
