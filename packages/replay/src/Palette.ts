import { UnknownColorCodeError } from "./errors.js"
import { assert } from "./utils.js"

export type RGB = readonly [r: number, g: number, b: number]

const hexPattern = /^#?([0-9a-fA-F]{6})$/

export function parseHexColor(color: string): RGB {
	const match = hexPattern.exec(color)
	assert(match !== null, `invalid hex color "${color}"`)
	const hex = match[1]
	return [parseInt(hex.slice(0, 2), 16), parseInt(hex.slice(2, 4), 16), parseInt(hex.slice(4, 6), 16)]
}

const hx = (x: number) => x.toString(16).padStart(2, "0")

export const formatHexColor = ([r, g, b]: RGB) => `${hx(r)}${hx(g)}${hx(b)}`

/**
 * Fixed lookup table from the small integer color codes found in a diff
 * to concrete RGB colors. Palettes are immutable once constructed.
 */
export class Palette {
	public static fromHex(colors: Iterable<string>): Palette {
		return new Palette(Array.from(colors, parseHexColor))
	}

	readonly #colors: RGB[]

	public constructor(colors: Iterable<RGB>) {
		this.#colors = Array.from(colors, ([r, g, b]) => Object.freeze([r, g, b] as const))
		assert(this.#colors.length > 0, "palette must have at least one color")
		assert(this.#colors.length <= 256, "palette cannot have more than 256 colors")
	}

	public get size() {
		return this.#colors.length
	}

	public has(code: number): boolean {
		return Number.isInteger(code) && code >= 0 && code < this.#colors.length
	}

	public resolve(code: number): RGB {
		if (!this.has(code)) {
			throw new UnknownColorCodeError(code)
		}

		return this.#colors[code]
	}

	public toHex(): string[] {
		return this.#colors.map(formatHexColor)
	}

	public [Symbol.iterator]() {
		return this.#colors.values()
	}
}
