import type { CanvasInit } from "./interface.js"
import { Palette } from "./Palette.js"
import { assert } from "./utils.js"

export interface Preset extends CanvasInit {
	name: string
	/** timestamps that are never emitted as cut points */
	exclude: number[]
}

export const place2017: Preset = {
	name: "place-2017",
	width: 1000,
	height: 1000,
	background: 0,
	palette: Palette.fromHex([
		"ffffff",
		"e4e4e4",
		"888888",
		"222222",
		"ffa7d1",
		"e50000",
		"e59500",
		"a06a42",
		"e5d900",
		"94e044",
		"02be01",
		"00d3dd",
		"0083c7",
		"0000ea",
		"cf6ee4",
		"820080",
	]),
	// the archive opens with a blank frame
	exclude: [1490986860],
}

export const presets: Record<string, Preset> = {
	[place2017.name]: place2017,
}

export function getPreset(name: string): Preset {
	const preset = presets[name]
	assert(preset !== undefined, `unknown preset "${name}"`, { available: Object.keys(presets) })
	return preset
}

export interface ConfigOverrides {
	width?: number
	height?: number
	background?: number
	exclude?: number[]
}

export function resolveReplayConfig(preset: Preset, overrides: ConfigOverrides = {}): Preset {
	const config: Preset = {
		...preset,
		width: overrides.width ?? preset.width,
		height: overrides.height ?? preset.height,
		background: overrides.background ?? preset.background,
		exclude: [...preset.exclude, ...(overrides.exclude ?? [])],
	}

	assert(Number.isInteger(config.width) && config.width > 0, "width must be a positive integer", {
		width: config.width,
	})
	assert(Number.isInteger(config.height) && config.height > 0, "height must be a positive integer", {
		height: config.height,
	})
	assert(config.palette.has(config.background), "background must be a palette code", {
		background: config.background,
		paletteSize: config.palette.size,
	})

	return config
}
