import { Palette, encodeRecord } from "@pixel-replay/replay"

export type Placement = [timestamp: number, x: number, y: number, color: number]

// black, white, red, green
export const palette = Palette.fromHex(["000000", "ffffff", "ff0000", "00ff00"])

export function encodePlacements(placements: Placement[]): Uint8Array {
	const bytes = new Uint8Array(placements.length * 16)
	placements.forEach(([timestamp, x, y, color], i) => bytes.set(encodeRecord({ timestamp, x, y, color }), i * 16))
	return bytes
}

export async function* chunked(bytes: Uint8Array, chunkSize: number): AsyncIterable<Uint8Array> {
	for (let i = 0; i < bytes.byteLength; i += chunkSize) {
		yield bytes.subarray(i, i + chunkSize)
	}
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
	const values: T[] = []
	for await (const value of iter) {
		values.push(value)
	}

	return values
}
