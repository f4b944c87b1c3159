import process from "node:process"

import type { Argv } from "yargs"
import chalk from "chalk"

import { Replay, getPreset, presets, resolveReplayConfig } from "@pixel-replay/replay"
import type { CutRequest } from "@pixel-replay/replay"

import { FileSink, SnapshotSink } from "../FileSink.js"
import { SnapshotFormat, formats } from "../encoders.js"
import { getCutRequest, getSnapshotName, openDiff, reportError } from "../utils.js"

export const command = "render <diff>"
export const desc = "Replay a diff and store canvas snapshots"

export const builder = (yargs: Argv) =>
	yargs
		.positional("diff", {
			desc: "Path to the binary diff (*.gz is decompressed), or - for stdin",
			type: "string",
			demandOption: true,
		})
		.option("output", {
			alias: "o",
			desc: "Directory to store snapshots in",
			type: "string",
			default: ".",
		})
		.option("format", {
			alias: "f",
			desc: "Snapshot file format",
			choices: formats,
			default: formats[0],
		})
		.option("latest", {
			desc: "Store only the final canvas",
			type: "boolean",
		})
		.option("interval", {
			desc: "Store a snapshot every N seconds from the first placement (0 for every timestamp)",
			type: "number",
		})
		.option("timestamp", {
			desc: "Store a snapshot at this unix timestamp (repeatable)",
			type: "number",
			array: true,
		})
		.conflicts("latest", ["interval", "timestamp"])
		.conflicts("interval", "timestamp")
		.check((argv) => {
			if (argv.latest || argv.interval !== undefined || argv.timestamp !== undefined) {
				return true
			} else {
				throw new Error("one of --latest, --interval or --timestamp is required")
			}
		})
		.option("preset", {
			desc: "Canvas dimensions, palette and excluded timestamps",
			choices: Object.keys(presets),
			default: "place-2017",
		})
		.option("width", { desc: "Override the preset's canvas width", type: "number" })
		.option("height", { desc: "Override the preset's canvas height", type: "number" })
		.option("background", { desc: "Override the preset's background color code", type: "number" })
		.option("exclude", {
			desc: "Never store a snapshot at this timestamp (repeatable)",
			type: "number",
			array: true,
		})
		.option("gunzip", {
			desc: "Decompress the diff (defaults to true for *.gz)",
			type: "boolean",
		})
		.option("allow-empty", {
			desc: "Succeed even if the diff has no placements",
			type: "boolean",
			default: false,
		})

type Args = ReturnType<typeof builder> extends Argv<infer T> ? T : never

export interface RenderOptions {
	diff: string
	output: string
	format: SnapshotFormat
	preset: string
	width?: number
	height?: number
	background?: number
	exclude?: number[]
	latest?: boolean
	interval?: number
	timestamp?: number[]
	gunzip?: boolean
	allowEmpty?: boolean
}

/**
 * Validate the options and wire a replay to its sink. The output directory is
 * created before the diff is opened, so a failure there leaves no stream open.
 */
export function prepareRender(options: RenderOptions): { cut: CutRequest; replay: Replay; sink: SnapshotSink } {
	const config = resolveReplayConfig(getPreset(options.preset), {
		width: options.width,
		height: options.height,
		background: options.background,
		exclude: options.exclude,
	})

	const cut = getCutRequest(options)
	const sink = new FileSink({ directory: options.output, format: options.format })
	const source = openDiff(options.diff, { gunzip: options.gunzip })
	const replay = Replay.fromBytes(source, { ...config, cut, allowEmpty: options.allowEmpty })
	return { cut, replay, sink }
}

export async function handler(args: Args) {
	try {
		const { cut, replay, sink } = prepareRender({ ...args, allowEmpty: args["allow-empty"] })

		await store(replay, sink, (timestamp) => getSnapshotName(cut, timestamp))

		for (const timestamp of replay.missing) {
			console.log(chalk.yellow(`[pixel-replay] Timestamp not found: ${timestamp}`))
		}

		console.log(`[pixel-replay] Replayed ${replay.eventCount} placements, stored ${replay.emitted} snapshots`)
	} catch (err) {
		reportError(err)
		process.exitCode = 1
	}
}

export async function store(replay: Replay, sink: SnapshotSink, getName: (timestamp: number) => string) {
	try {
		for await (const snapshot of replay.snapshots()) {
			const file = await sink.write(getName(snapshot.timestamp), snapshot)
			console.log(`[pixel-replay] Storing ${file}`)
		}
	} catch (err) {
		// flush what was already emitted before surfacing the replay error
		await sink.close().catch((closeErr: unknown) => {
			console.error(chalk.red(`[pixel-replay] Failed to store snapshots (${String(closeErr)})`))
		})

		throw err
	}

	await sink.close()
}
