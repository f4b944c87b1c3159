import type { CanvasInit, PlacementEvent } from "./interface.js"
import type { Palette } from "./Palette.js"
import { Snapshot } from "./Snapshot.js"
import { MalformedRecordError, UnknownColorCodeError } from "./errors.js"
import { assert } from "./utils.js"

/**
 * The mutable pixel grid of a single replay run.
 */
export class CanvasState {
	public readonly width: number
	public readonly height: number
	public readonly palette: Palette
	public readonly background: number

	readonly #codes: Uint8Array

	public constructor({ width, height, palette, background }: CanvasInit) {
		assert(Number.isInteger(width) && width > 0, "canvas width must be a positive integer", { width })
		assert(Number.isInteger(height) && height > 0, "canvas height must be a positive integer", { height })
		if (!palette.has(background)) {
			throw new UnknownColorCodeError(background)
		}

		this.width = width
		this.height = height
		this.palette = palette
		this.background = background
		this.#codes = new Uint8Array(width * height).fill(background)
	}

	public apply({ x, y, color, offset }: PlacementEvent) {
		if (!Number.isInteger(x) || x < 0 || x >= this.width) {
			throw new MalformedRecordError(offset, `x coordinate ${x} is outside canvas width ${this.width}`)
		} else if (!Number.isInteger(y) || y < 0 || y >= this.height) {
			throw new MalformedRecordError(offset, `y coordinate ${y} is outside canvas height ${this.height}`)
		} else if (!this.palette.has(color)) {
			throw new UnknownColorCodeError(color, offset)
		}

		this.#codes[y * this.width + x] = color
	}

	public snapshot(timestamp: number, index: number): Snapshot {
		const { width, height, palette } = this
		return new Snapshot({ width, height, palette, timestamp, index, codes: this.#codes.slice() })
	}
}
