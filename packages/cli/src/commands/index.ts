import type { CommandModule } from "yargs"

import * as render from "./render.js"
import * as info from "./info.js"
import * as presets from "./presets.js"

export const commands = [render, info, presets] as unknown as CommandModule[]
