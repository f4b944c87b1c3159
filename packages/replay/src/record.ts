import type { PlacementEvent } from "./interface.js"
import { assert, isUint32 } from "./utils.js"

/**
 * Diff format v1: back-to-back 16-byte records, no header, no delimiters.
 *
 * | offset | width | field     |
 * | ------ | ----- | --------- |
 * | 0      | u32   | timestamp |
 * | 4      | u32   | x         |
 * | 8      | u32   | y         |
 * | 12     | u32   | color     |
 *
 * All fields are little-endian.
 */
export const RECORD_SIZE = 16

export function decodeRecord(bytes: Uint8Array, offset = 0): PlacementEvent {
	if (bytes.byteLength < RECORD_SIZE) {
		throw new RangeError(`record too small: expected ${RECORD_SIZE} bytes, got ${bytes.byteLength}`)
	}

	const view = new DataView(bytes.buffer, bytes.byteOffset, RECORD_SIZE)
	return {
		timestamp: view.getUint32(0, true),
		x: view.getUint32(4, true),
		y: view.getUint32(8, true),
		color: view.getUint32(12, true),
		offset,
	}
}

export function encodeRecord({ timestamp, x, y, color }: Omit<PlacementEvent, "offset">): Uint8Array {
	for (const [name, value] of Object.entries({ timestamp, x, y, color })) {
		assert(isUint32(value), `${name} must be an unsigned 32-bit integer`, { [name]: value })
	}

	const bytes = new Uint8Array(RECORD_SIZE)
	const view = new DataView(bytes.buffer)
	view.setUint32(0, timestamp, true)
	view.setUint32(4, x, true)
	view.setUint32(8, y, true)
	view.setUint32(12, color, true)
	return bytes
}
