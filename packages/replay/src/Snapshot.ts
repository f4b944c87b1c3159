import type { Palette, RGB } from "./Palette.js"
import { assert } from "./utils.js"

export interface SnapshotInit {
	width: number
	height: number
	palette: Palette
	/** the cut point this snapshot was taken at */
	timestamp: number
	/** position in the replay's emission order, starting at 0 */
	index: number
	codes: Uint8Array
}

/**
 * An immutable copy of the canvas at a cut point.
 * Cells are palette codes in row-major order.
 */
export class Snapshot {
	public readonly width: number
	public readonly height: number
	public readonly palette: Palette
	public readonly timestamp: number
	public readonly index: number

	readonly #codes: Uint8Array

	public constructor(init: SnapshotInit) {
		assert(init.codes.byteLength === init.width * init.height, "snapshot size does not match its dimensions")
		this.width = init.width
		this.height = init.height
		this.palette = init.palette
		this.timestamp = init.timestamp
		this.index = init.index
		this.#codes = init.codes
	}

	/** A copy of the cell codes */
	public get codes(): Uint8Array {
		return this.#codes.slice()
	}

	public getCode(x: number, y: number): number {
		assert(x >= 0 && x < this.width && y >= 0 && y < this.height, "pixel out of bounds", { x, y })
		return this.#codes[y * this.width + x]
	}

	public getColor(x: number, y: number): RGB {
		return this.palette.resolve(this.getCode(x, y))
	}

	public rows(): number[][] {
		const rows: number[][] = []
		for (let y = 0; y < this.height; y++) {
			rows.push(Array.from(this.#codes.subarray(y * this.width, (y + 1) * this.width)))
		}

		return rows
	}

	/** Packed 8-bit RGB, row-major */
	public toRGB(): Uint8Array {
		const colors = Array.from(this.palette)
		const out = new Uint8Array(this.#codes.byteLength * 3)
		for (let i = 0; i < this.#codes.byteLength; i++) {
			const [r, g, b] = colors[this.#codes[i]]
			out[i * 3] = r
			out[i * 3 + 1] = g
			out[i * 3 + 2] = b
		}

		return out
	}

	/** Compares pixels only, not labels */
	public equals(other: Snapshot): boolean {
		if (this.width !== other.width || this.height !== other.height) {
			return false
		}

		for (let i = 0; i < this.#codes.byteLength; i++) {
			if (this.#codes[i] !== other.#codes[i]) {
				return false
			}
		}

		return true
	}
}
