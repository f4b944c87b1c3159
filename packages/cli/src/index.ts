#!/usr/bin/env -S node --import tsx

import yargs from "yargs"
import { hideBin } from "yargs/helpers"

import { commands } from "./commands/index.js"

await commands
	.reduce((argv, command) => argv.command(command), yargs(hideBin(process.argv)))
	.demandCommand()
	.recommendCommands()
	.strict()
	.scriptName("pixel-replay")
	.help()
	.parseAsync()
