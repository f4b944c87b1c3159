import fs from "node:fs"
import os from "node:os"
import path from "node:path"

import type { ExecutionContext } from "ava"

import { Palette, encodeRecord } from "@pixel-replay/replay"

export type Placement = [timestamp: number, x: number, y: number, color: number]

// white, black, red
export const palette = Palette.fromHex(["ffffff", "000000", "ff0000"])

export function encodePlacements(placements: Placement[]): Uint8Array {
	const bytes = new Uint8Array(placements.length * 16)
	placements.forEach(([timestamp, x, y, color], i) => bytes.set(encodeRecord({ timestamp, x, y, color }), i * 16))
	return bytes
}

export function getDirectory(t: ExecutionContext): string {
	const directory = fs.mkdtempSync(path.resolve(os.tmpdir(), "pixel-replay-"))
	t.teardown(() => fs.rmSync(directory, { recursive: true, force: true }))
	return directory
}
