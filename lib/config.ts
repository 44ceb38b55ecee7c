import { Alignment, classifyNumeric, type AlignmentClassifier, type AlignmentMode } from "./format.js";

/** Junction glyph where row and column separators meet */
export const CENTER = "+";
/** Horizontal rule glyph */
export const ROW = "-";
/** Vertical separator glyph */
export const COLUMN = "|";
/** Cell padding and blank-edge filler */
export const SPACE = " ";
export const NEWLINE = "\n";

/** Default cap applied to observed column widths */
export const MAX_COLUMN_WIDTH = 30;

export const DEFAULT_CAPTION = "Table caption.";

export interface Border {
	left: boolean;
	right: boolean;
	top: boolean;
	bottom: boolean;
}

export interface TableConfig {
	border: Border;
	centerSeparator: string;
	rowSeparator: string;
	columnSeparator: string;
	newline: string;
	alignment: AlignmentMode;
	/** Per-column body alignment; missing entries fall back to `alignment` */
	columnAlignment: AlignmentMode[];
	headerAlignment: AlignmentMode;
	footerAlignment: AlignmentMode;
	/** Resolves DEFAULT alignment for body cells */
	classifier: AlignmentClassifier;
	autoFormatHeaders: boolean;
	autoWrapText: boolean;
	maxColumnWidth: number;
	/** Continuation marker appended where a long token is hard-broken */
	breakMarker: string;
	rowLine: boolean;
	headerLine: boolean;
	caption: boolean;
	captionText: string;
}

export type TableOptions = Partial<Omit<TableConfig, "border">> & {
	border?: Partial<Border>;
};

export const DEFAULT_TABLE_CONFIG: Readonly<TableConfig> = Object.freeze({
	border: Object.freeze({ left: true, right: true, top: true, bottom: true }),
	centerSeparator: CENTER,
	rowSeparator: ROW,
	columnSeparator: COLUMN,
	newline: NEWLINE,
	alignment: Alignment.DEFAULT,
	columnAlignment: [],
	headerAlignment: Alignment.DEFAULT,
	footerAlignment: Alignment.DEFAULT,
	classifier: classifyNumeric,
	autoFormatHeaders: true,
	autoWrapText: true,
	maxColumnWidth: MAX_COLUMN_WIDTH,
	breakMarker: "",
	rowLine: false,
	headerLine: true,
	caption: false,
	captionText: DEFAULT_CAPTION,
});

/**
 * Merge partial options over the defaults into a fresh, mutable config.
 * Border flags are merged one by one.
 */
export function resolveTableConfig(options: TableOptions = {}): TableConfig {
	const { border, columnAlignment, ...rest } = options;
	return {
		...DEFAULT_TABLE_CONFIG,
		...rest,
		border: { ...DEFAULT_TABLE_CONFIG.border, ...border },
		columnAlignment: [...(columnAlignment ?? DEFAULT_TABLE_CONFIG.columnAlignment)],
	};
}
