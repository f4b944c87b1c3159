import fs from "node:fs"
import path from "node:path"

import test from "ava"

import { CanvasState, Snapshot } from "@pixel-replay/replay"

import { FileSink } from "../src/FileSink.js"
import { encodePPM } from "../src/encoders.js"
import { getDirectory, palette } from "./utils.js"

test("write snapshots in order and wait for them on close", async (t) => {
	const directory = path.resolve(getDirectory(t), "nested", "output")
	const sink = new FileSink({ directory, format: "ppm", maxPending: 2 })
	t.true(fs.existsSync(directory))

	const canvas = new CanvasState({ width: 3, height: 3, palette, background: 0 })
	const snapshots: Snapshot[] = []
	for (let i = 0; i < 6; i++) {
		canvas.apply({ timestamp: 100 + i, x: i % 3, y: Math.floor(i / 3), color: 1 + (i % 2), offset: i * 16 })
		snapshots.push(canvas.snapshot(100 + i, i))
	}

	const files: string[] = []
	for (const snapshot of snapshots) {
		files.push(await sink.write(snapshot.timestamp.toString(), snapshot))
	}

	await sink.close()

	t.deepEqual(
		files,
		snapshots.map(({ timestamp }) => path.resolve(directory, `${timestamp}.ppm`)),
	)

	for (const [i, file] of files.entries()) {
		t.deepEqual(new Uint8Array(fs.readFileSync(file)), encodePPM(snapshots[i]))
	}
})

test("write failures surface on close", async (t) => {
	const directory = getDirectory(t)
	const sink = new FileSink({ directory, format: "cbor" })
	fs.mkdirSync(path.resolve(directory, "latest.cbor"))

	const canvas = new CanvasState({ width: 1, height: 1, palette, background: 0 })
	await sink.write("latest", canvas.snapshot(0, 0))
	await t.throwsAsync(sink.close(), { code: "EISDIR" })
})
