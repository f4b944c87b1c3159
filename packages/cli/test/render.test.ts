import fs from "node:fs"
import path from "node:path"
import zlib from "node:zlib"

import test from "ava"

import { MalformedRecordError, Replay, decodeRecords } from "@pixel-replay/replay"

import { prepareRender, store } from "../src/commands/render.js"
import { summarize } from "../src/commands/info.js"
import { FileSink } from "../src/FileSink.js"
import { getCutRequest, getSnapshotName, openDiff } from "../src/utils.js"
import { encodePlacements, getDirectory, palette } from "./utils.js"

const bytes = encodePlacements([
	[1000, 0, 0, 1],
	[1000, 1, 0, 2],
	[1060, 1, 1, 1],
	[1200, 0, 0, 2],
])

const config = { width: 2, height: 2, palette, background: 0 }

test("cut requests from command line arguments", (t) => {
	t.deepEqual(getCutRequest({ latest: true }), { type: "latest" })
	t.deepEqual(getCutRequest({ interval: 0 }), { type: "interval", interval: 0 })
	t.deepEqual(getCutRequest({ timestamp: [5, 3] }), { type: "timestamps", timestamps: [5, 3] })
	t.throws(() => getCutRequest({}), { message: "one of --latest, --interval or --timestamp is required" })
})

test("snapshot names", (t) => {
	t.is(getSnapshotName({ type: "latest" }, 1200), "latest")
	t.is(getSnapshotName({ type: "interval", interval: 60 }, 1060), "1060")
})

test("open plain and gzipped diffs", async (t) => {
	const directory = getDirectory(t)
	const plainPath = path.resolve(directory, "diff.bin")
	const gzipPath = path.resolve(directory, "diff.bin.gz")
	fs.writeFileSync(plainPath, bytes)
	fs.writeFileSync(gzipPath, zlib.gzipSync(bytes))

	const plain = await summarize(decodeRecords(openDiff(plainPath), config))
	const gzipped = await summarize(decodeRecords(openDiff(gzipPath), config))

	t.deepEqual(plain, gzipped)
	t.is(plain.placements, 4)
	t.is(plain.timestamps, 3)
	t.is(plain.first, 1000)
	t.is(plain.last, 1200)
	t.deepEqual([...plain.colors], [
		[1, 2],
		[2, 2],
	])

	t.throws(() => openDiff(path.resolve(directory, "missing.bin")), { message: /does not exist$/ })
})

test("read errors on a gzipped diff reject the decoder", async (t) => {
	const directory = getDirectory(t)
	const location = path.resolve(directory, "diff.bin.gz")
	fs.mkdirSync(location)

	await t.throwsAsync(summarize(decodeRecords(openDiff(location), config)), { code: "EISDIR" })
})

test("store an interval replay to files", async (t) => {
	const directory = getDirectory(t)
	const cut = getCutRequest({ interval: 100 })
	const replay = Replay.fromBytes([bytes], { ...config, cut })
	const sink = new FileSink({ directory, format: "cbor" })

	await store(replay, sink, (timestamp) => getSnapshotName(cut, timestamp))

	t.deepEqual(fs.readdirSync(directory).sort(), ["1000.cbor", "1100.cbor", "1200.cbor"])
	t.is(replay.emitted, 3)
})

test("store the latest snapshot", async (t) => {
	const directory = getDirectory(t)
	const cut = getCutRequest({ latest: true })
	const replay = Replay.fromBytes([bytes], { ...config, cut })
	const sink = new FileSink({ directory, format: "ppm" })

	await store(replay, sink, (timestamp) => getSnapshotName(cut, timestamp))

	t.deepEqual(fs.readdirSync(directory), ["latest.ppm"])
	t.deepEqual(Array.from(fs.readFileSync(path.resolve(directory, "latest.ppm")).subarray(11)), [
		255, 0, 0, 255, 0, 0, 255, 255, 255, 0, 0, 0,
	])
})

test("snapshots before a corrupt record are still stored", async (t) => {
	const directory = getDirectory(t)
	const corrupt = new Uint8Array([...bytes, ...encodePlacements([[1300, 0, 2, 1]])])
	const cut = getCutRequest({ timestamp: [1000, 1250, 1400] })
	const replay = Replay.fromBytes([corrupt], { ...config, cut })
	const sink = new FileSink({ directory, format: "ppm" })

	const error = await t.throwsAsync(
		store(replay, sink, (timestamp) => getSnapshotName(cut, timestamp)),
		{ instanceOf: MalformedRecordError },
	)

	t.is(error?.offset, 64)
	t.deepEqual(fs.readdirSync(directory).sort(), ["1000.ppm"])
})

test("the output directory is created before the diff is opened", (t) => {
	const directory = getDirectory(t)
	const file = path.resolve(directory, "file")
	fs.writeFileSync(file, "")

	const options = { diff: path.resolve(directory, "missing.bin"), format: "ppm" as const, preset: "place-2017", latest: true }

	t.throws(() => prepareRender({ ...options, output: path.resolve(file, "out") }), { code: "ENOTDIR" })
	t.throws(() => prepareRender({ ...options, output: path.resolve(directory, "out") }), { message: /does not exist$/ })
	t.true(fs.existsSync(path.resolve(directory, "out")))
})

test("prepare a render from command line options", async (t) => {
	const directory = getDirectory(t)
	const diff = path.resolve(directory, "diff.bin")
	fs.writeFileSync(diff, encodePlacements([[1490986800, 3, 4, 5]]))

	const output = path.resolve(directory, "out")
	const { cut, replay, sink } = prepareRender({ diff, output, format: "png", preset: "place-2017", timestamp: [1490986860] })
	await store(replay, sink, (timestamp) => getSnapshotName(cut, timestamp))

	t.deepEqual(fs.readdirSync(output), ["1490986860.png"])
	t.deepEqual(replay.missing, [])
})
