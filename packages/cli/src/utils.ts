import fs from "node:fs"
import process from "node:process"
import zlib from "node:zlib"
import { pipeline } from "node:stream"
import type { Readable } from "node:stream"

import { logger } from "@libp2p/logger"
import chalk from "chalk"

import { AssertError, MalformedRecordError, UnknownColorCodeError } from "@pixel-replay/replay"
import type { CutRequest } from "@pixel-replay/replay"

const log = logger("pixel-replay:cli")

/**
 * Open a diff for reading. "-" reads stdin; paths ending in .gz are
 * decompressed unless `gunzip` says otherwise.
 */
export function openDiff(location: string, options: { gunzip?: boolean } = {}): Readable {
	const gunzip = options.gunzip ?? location.endsWith(".gz")

	let stream: Readable
	if (location === "-") {
		stream = process.stdin
	} else if (fs.existsSync(location)) {
		stream = fs.createReadStream(location)
	} else {
		throw new Error(`${location} does not exist`)
	}

	if (!gunzip) {
		return stream
	}

	// pipeline destroys the gunzip stream with any read error, so it reaches the consumer
	const decompressed = zlib.createGunzip()
	pipeline(stream, decompressed, (err) => {
		if (err) {
			log.error("failed to read %s: %O", location, err)
		}
	})

	return decompressed
}

export function getCutRequest(args: { latest?: boolean; interval?: number; timestamp?: number[] }): CutRequest {
	if (args.latest) {
		return { type: "latest" }
	} else if (args.interval !== undefined) {
		return { type: "interval", interval: args.interval }
	} else if (args.timestamp !== undefined && args.timestamp.length > 0) {
		return { type: "timestamps", timestamps: args.timestamp }
	} else {
		throw new Error("one of --latest, --interval or --timestamp is required")
	}
}

/** Output files are named after their cut point, or "latest" */
export const getSnapshotName = (cut: CutRequest, timestamp: number) =>
	cut.type === "latest" ? "latest" : timestamp.toString()

export function reportError(err: unknown) {
	if (err instanceof MalformedRecordError || err instanceof UnknownColorCodeError) {
		console.error(chalk.red(`[pixel-replay] Corrupt diff: ${err.message}`))
	} else if (err instanceof AssertError) {
		console.error(chalk.red(`[pixel-replay] Invalid configuration: ${err.message}`))
	} else if (err instanceof Error) {
		console.error(chalk.red(`[pixel-replay] ${err.message}`))
	} else {
		throw err
	}
}
