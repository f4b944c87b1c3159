import type { Uint8ArrayList } from "uint8arraylist"

import type { Palette } from "./Palette.js"

/** One decoded "place a pixel" record */
export interface PlacementEvent {
	/** seconds since the unix epoch */
	timestamp: number
	x: number
	y: number
	color: number
	/** byte offset of the record in the source stream */
	offset: number
}

export interface CanvasDimensions {
	width: number
	height: number
}

export interface CanvasInit extends CanvasDimensions {
	palette: Palette
	/** palette code every cell starts out with */
	background: number
}

export type ByteSource = AsyncIterable<Uint8Array | Uint8ArrayList> | Iterable<Uint8Array | Uint8ArrayList>
