import * as cbor from "@ipld/dag-cbor"
import { PNG } from "pngjs"
import { concat, fromString } from "uint8arrays"

import type { Snapshot } from "@pixel-replay/replay"

export const formats = ["png", "ppm", "cbor"] as const

export type SnapshotFormat = (typeof formats)[number]

/** The CBOR document written for `--format cbor` */
export type EncodedSnapshot = {
	width: number
	height: number
	timestamp: number
	index: number
	palette: string[]
	codes: Uint8Array
}

/** 8-bit RGBA PNG with every pixel opaque */
export function encodePNG(snapshot: Snapshot): Uint8Array {
	const png = new PNG({ width: snapshot.width, height: snapshot.height })
	const rgb = snapshot.toRGB()
	for (let i = 0; i < snapshot.width * snapshot.height; i++) {
		png.data[i * 4] = rgb[i * 3]
		png.data[i * 4 + 1] = rgb[i * 3 + 1]
		png.data[i * 4 + 2] = rgb[i * 3 + 2]
		png.data[i * 4 + 3] = 0xff
	}

	return PNG.sync.write(png)
}

/** Binary netpbm (P6) with 8-bit channels */
export function encodePPM(snapshot: Snapshot): Uint8Array {
	const header = fromString(`P6\n${snapshot.width} ${snapshot.height}\n255\n`)
	return concat([header, snapshot.toRGB()])
}

export function encodeCBOR(snapshot: Snapshot): Uint8Array {
	const { width, height, timestamp, index, palette, codes } = snapshot
	return cbor.encode<EncodedSnapshot>({ width, height, timestamp, index, palette: palette.toHex(), codes })
}

export function encodeSnapshot(snapshot: Snapshot, format: SnapshotFormat): Uint8Array {
	switch (format) {
		case "png":
			return encodePNG(snapshot)
		case "ppm":
			return encodePPM(snapshot)
		case "cbor":
			return encodeCBOR(snapshot)
	}
}
