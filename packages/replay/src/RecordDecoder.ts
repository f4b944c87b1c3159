import { logger } from "@libp2p/logger"
import { Uint8ArrayList } from "uint8arraylist"

import type { ByteSource, CanvasDimensions, PlacementEvent } from "./interface.js"
import type { Palette } from "./Palette.js"
import { MalformedRecordError, UnknownColorCodeError } from "./errors.js"
import { RECORD_SIZE, decodeRecord } from "./record.js"

export interface DecoderInit extends CanvasDimensions {
	palette: Palette
}

/**
 * Lazily decode a diff byte stream into placement events.
 *
 * Chunks may split records anywhere; only the bytes of the current partial
 * record are retained between chunks. A trailing remainder shorter than one
 * record ends iteration. Records with out-of-range coordinates or colors abort
 * decoding with the byte offset of the offending record.
 */
export async function* decodeRecords(source: ByteSource, init: DecoderInit): AsyncGenerator<PlacementEvent> {
	const log = logger("pixel-replay:decoder")
	const { width, height, palette } = init

	const buffer = new Uint8ArrayList()
	let offset = 0
	let previous: number | null = null

	for await (const chunk of source) {
		buffer.append(chunk)

		while (buffer.byteLength >= RECORD_SIZE) {
			const event = decodeRecord(buffer.subarray(0, RECORD_SIZE), offset)
			buffer.consume(RECORD_SIZE)

			if (event.x >= width) {
				throw new MalformedRecordError(offset, `x coordinate ${event.x} is outside canvas width ${width}`)
			} else if (event.y >= height) {
				throw new MalformedRecordError(offset, `y coordinate ${event.y} is outside canvas height ${height}`)
			} else if (!palette.has(event.color)) {
				throw new UnknownColorCodeError(event.color, offset)
			}

			if (previous !== null && event.timestamp < previous) {
				log.error("timestamp %d at offset %d precedes timestamp %d", event.timestamp, offset, previous)
			}

			previous = event.timestamp
			offset += RECORD_SIZE
			yield event
		}
	}

	if (buffer.byteLength > 0) {
		log("ignoring %d trailing bytes at offset %d", buffer.byteLength, offset)
	}

	log("decoded %d records", offset / RECORD_SIZE)
}
