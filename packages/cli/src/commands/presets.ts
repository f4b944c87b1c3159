import type { Argv } from "yargs"
import chalk from "chalk"

import { presets } from "@pixel-replay/replay"

export const command = "presets"
export const desc = "List the built-in canvas presets"

export const builder = (yargs: Argv) => yargs

export async function handler() {
	for (const preset of Object.values(presets)) {
		console.log(chalk.green(preset.name))
		console.log(`canvas:     ${preset.width}x${preset.height}`)
		console.log(`background: ${preset.background}`)
		console.log(`palette:    ${preset.palette.toHex().join(" ")}`)
		console.log(`exclude:    ${preset.exclude.join(" ") || "-"}`)
		console.log("")
	}
}
