export type { PlacementEvent, CanvasDimensions, CanvasInit, ByteSource } from "./interface.js"

export * from "./errors.js"
export * from "./Palette.js"
export * from "./record.js"
export * from "./RecordDecoder.js"
export * from "./Snapshot.js"
export * from "./CanvasState.js"
export * from "./CutSchedule.js"
export * from "./replay.js"
export * from "./presets.js"

export { AssertError, assert } from "./utils.js"
