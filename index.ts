export { Table } from "./lib/table.js";
export {
	Alignment,
	classifyLabel,
	classifyNumeric,
	formatLabel,
	pad,
	padCenter,
	padLeft,
	padRight,
	type AlignmentClassifier,
	type AlignmentMode,
	type ResolvedAlignment,
} from "./lib/format.js";
export {
	CENTER,
	COLUMN,
	DEFAULT_CAPTION,
	DEFAULT_TABLE_CONFIG,
	MAX_COLUMN_WIDTH,
	NEWLINE,
	ROW,
	SPACE,
	resolveTableConfig,
	type Border,
	type TableConfig,
	type TableOptions,
} from "./lib/config.js";
export { DimensionTracker } from "./lib/dimensions.js";
export { displayWidth, scanSegments, sliceWidth, stripAnsi, type Segment, type SegmentKind } from "./lib/width.js";
export { maxLineWidth, splitLines, wrapText, type WrapOptions } from "./lib/wrap.js";
export {
	RENDER_REGIONS,
	borderLine,
	renderGrid,
	renderRegion,
	type FooterCell,
	type RenderModel,
	type RenderRegion,
	type WrappedCell,
	type WrappedRow,
} from "./lib/render.js";
export { createBufferSink, createFdSink, type BufferSink, type OutputSink } from "./lib/sink.js";
export { ErrorCode, GridError, GridOutputError, type ErrorCodeType, type GridErrorOptions } from "./lib/errors.js";
export { createLogger, initLogger, type LogClient, type LogEntry, type ScopedLogger } from "./lib/logger.js";
