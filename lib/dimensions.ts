/**
 * Per-column widths and per-row heights, grown monotonically while rows are
 * added and read back during rendering.
 */
export class DimensionTracker {
	private readonly widths: Map<number, number> = new Map();
	private readonly heights: Map<number, number> = new Map();
	private maxColumnWidth: number;

	constructor(maxColumnWidth: number) {
		this.maxColumnWidth = maxColumnWidth;
	}

	/**
	 * Change the cap applied by later `observeColumn` calls.
	 * Widths already recorded are left as they are.
	 */
	setMaxColumnWidth(width: number): void {
		this.maxColumnWidth = Math.max(0, Math.floor(width));
	}

	getMaxColumnWidth(): number {
		return this.maxColumnWidth;
	}

	/**
	 * Record a content width for a column, capped at the max column width.
	 * @returns The column's resolved width after the observation
	 */
	observeColumn(column: number, width: number): number {
		return this.growColumn(column, Math.min(width, this.maxColumnWidth));
	}

	/**
	 * Record a width that cannot be reduced by wrapping. Ignores the cap.
	 * @returns The column's resolved width after the observation
	 */
	expandColumn(column: number, width: number): number {
		return this.growColumn(column, width);
	}

	/**
	 * Record the wrapped line count of a cell in a body row.
	 * @returns The row's resolved height after the observation
	 */
	observeRow(row: number, lineCount: number): number {
		const next = Math.max(this.heights.get(row) ?? 0, toSize(lineCount));
		this.heights.set(row, next);
		return next;
	}

	columnWidth(column: number): number {
		return this.widths.get(column) ?? 0;
	}

	rowHeight(row: number): number {
		return this.heights.get(row) ?? 0;
	}

	/** One past the highest column index observed so far */
	get columnCount(): number {
		let count = 0;
		for (const column of this.widths.keys()) {
			if (column + 1 > count) count = column + 1;
		}
		return count;
	}

	/**
	 * Dense snapshot of column widths, `count` entries long (defaults to the
	 * observed column count). Unobserved columns report 0.
	 */
	columnWidths(count: number = this.columnCount): number[] {
		return Array.from({ length: count }, (_, column) => this.columnWidth(column));
	}

	/**
	 * Length of a rendered border line: every column plus its two padding
	 * spaces and one separator, plus the closing separator.
	 */
	tableWidth(count: number = this.columnCount): number {
		const content = this.columnWidths(count).reduce((sum, width) => sum + width, 0);
		return content + 3 * count + 1;
	}

	private growColumn(column: number, width: number): number {
		const next = Math.max(this.widths.get(column) ?? 0, toSize(width));
		this.widths.set(column, next);
		return next;
	}
}

function toSize(value: number): number {
	return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}
