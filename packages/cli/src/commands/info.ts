import process from "node:process"

import type { Argv } from "yargs"
import chalk from "chalk"

import { decodeRecords, getPreset, presets, resolveReplayConfig } from "@pixel-replay/replay"

import { openDiff, reportError } from "../utils.js"

export const command = "info <diff>"
export const desc = "Summarize the placements in a diff"

export const builder = (yargs: Argv) =>
	yargs
		.positional("diff", {
			desc: "Path to the binary diff (*.gz is decompressed), or - for stdin",
			type: "string",
			demandOption: true,
		})
		.option("preset", {
			desc: "Canvas dimensions and palette to validate against",
			choices: Object.keys(presets),
			default: "place-2017",
		})
		.option("width", { desc: "Override the preset's canvas width", type: "number" })
		.option("height", { desc: "Override the preset's canvas height", type: "number" })
		.option("gunzip", {
			desc: "Decompress the diff (defaults to true for *.gz)",
			type: "boolean",
		})

type Args = ReturnType<typeof builder> extends Argv<infer T> ? T : never

export interface DiffSummary {
	placements: number
	timestamps: number
	first: number | null
	last: number | null
	colors: Map<number, number>
}

export async function summarize(events: AsyncIterable<{ timestamp: number; color: number }>): Promise<DiffSummary> {
	const summary: DiffSummary = { placements: 0, timestamps: 0, first: null, last: null, colors: new Map() }
	for await (const { timestamp, color } of events) {
		if (timestamp !== summary.last) {
			summary.timestamps++
		}

		summary.placements++
		summary.first ??= timestamp
		summary.last = timestamp
		summary.colors.set(color, (summary.colors.get(color) ?? 0) + 1)
	}

	return summary
}

export async function handler(args: Args) {
	try {
		const { width, height, palette } = resolveReplayConfig(getPreset(args.preset), {
			width: args.width,
			height: args.height,
		})

		const source = openDiff(args.diff, { gunzip: args.gunzip })
		const summary = await summarize(decodeRecords(source, { width, height, palette }))

		console.log(chalk.green("===== placements ====="))
		console.log(`placements: ${summary.placements}`)
		console.log(`distinct timestamps: ${summary.timestamps}`)
		if (summary.first !== null && summary.last !== null) {
			console.log(`first: ${summary.first} (${new Date(summary.first * 1000).toISOString()})`)
			console.log(`last: ${summary.last} (${new Date(summary.last * 1000).toISOString()})`)
		}

		console.log("")
		console.log(chalk.green("===== colors ====="))
		const hex = palette.toHex()
		for (const [code, count] of [...summary.colors].sort(([a], [b]) => a - b)) {
			console.log(`${code.toString().padStart(3)}  #${hex[code]}  ${count}`)
		}
	} catch (err) {
		reportError(err)
		process.exitCode = 1
	}
}
