import {
	resolveTableConfig,
	type Border,
	type TableConfig,
	type TableOptions,
} from "./config.js";
import { DimensionTracker } from "./dimensions.js";
import { GridOutputError, describeError } from "./errors.js";
import type { AlignmentClassifier, AlignmentMode } from "./format.js";
import { createLogger } from "./logger.js";
import { renderGrid, type FooterCell, type WrappedRow } from "./render.js";
import { createFdSink, type OutputSink } from "./sink.js";
import { displayWidth } from "./width.js";
import { maxLineWidth, splitLines, wrapText } from "./wrap.js";

const log = createLogger("table");

/**
 * A text table rendered as a fixed-width grid.
 *
 * Cells are measured and wrapped as they are added, so column widths and row
 * heights only ever grow. `render()` lays out whatever has been added so far
 * and may be called again after further appends.
 *
 * @example
 * ```ts
 * const table = new Table(createBufferSink());
 * table.setHeader(["Name", "Sign", "Rating"]);
 * table.append(["A", "The Good", "500"]);
 * table.render();
 * ```
 */
export class Table {
	private readonly sink: OutputSink;
	private readonly config: TableConfig;
	private readonly dimensions: DimensionTracker;
	private header: WrappedRow = [];
	private footer: FooterCell[] = [];
	private readonly rows: WrappedRow[] = [];

	constructor(sink: OutputSink = createFdSink(), options: TableOptions = {}) {
		this.sink = sink;
		this.config = resolveTableConfig(options);
		this.dimensions = new DimensionTracker(this.config.maxColumnWidth);
	}

	/**
	 * Set the header labels. The label count fixes the minimum column count.
	 */
	setHeader(cells: readonly string[]): void {
		this.header = cells.map((cell, column) => this.layoutCell(cell, column));
	}

	/**
	 * Set the footer labels. Empty labels leave their cells out of the
	 * footer rule.
	 */
	setFooter(cells: readonly string[]): void {
		this.footer = cells.map((text, column) => ({ text, lines: this.layoutCell(text, column) }));
	}

	setCaption(enabled: boolean, text?: string): void {
		this.config.caption = enabled;
		if (text !== undefined) {
			this.config.captionText = text;
		}
	}

	append(row: readonly string[]): void {
		const rowIndex = this.rows.length;
		if (row.length > this.columnCount()) {
			log.debug("Row extends the column count", { row: rowIndex, cells: row.length });
		}

		this.dimensions.observeRow(rowIndex, 0);
		const wrapped = row.map((cell, column) => {
			const lines = this.layoutCell(cell, column);
			this.dimensions.observeRow(rowIndex, lines.length);
			return lines;
		});
		this.rows.push(wrapped);
	}

	appendBulk(rows: readonly (readonly string[])[]): void {
		for (const row of rows) {
			this.append(row);
		}
	}

	/** Turn every edge of the outer box on or off */
	setBorder(enabled: boolean): void {
		this.setBorders({ left: enabled, right: enabled, top: enabled, bottom: enabled });
	}

	setBorders(border: Border): void {
		this.config.border = { ...border };
	}

	/** Body alignment for every column without a per-column override */
	setAlignment(mode: AlignmentMode): void {
		this.config.alignment = mode;
	}

	/** Per-column body alignment; index `i` applies to column `i` */
	setColumnAlignment(modes: readonly AlignmentMode[]): void {
		this.config.columnAlignment = [...modes];
	}

	setHeaderAlignment(mode: AlignmentMode): void {
		this.config.headerAlignment = mode;
	}

	setFooterAlignment(mode: AlignmentMode): void {
		this.config.footerAlignment = mode;
	}

	/** Replace the classifier that resolves DEFAULT body alignment */
	setAlignmentClassifier(classifier: AlignmentClassifier): void {
		this.config.classifier = classifier;
	}

	setAutoFormatHeaders(enabled: boolean): void {
		this.config.autoFormatHeaders = enabled;
	}

	/**
	 * With auto-wrap off, cells are split on newlines only and columns grow to
	 * fit the longest line. Applies to cells added afterwards.
	 */
	setAutoWrapText(enabled: boolean): void {
		this.config.autoWrapText = enabled;
	}

	/** Cap on column widths for cells added afterwards */
	setColumnWidth(width: number): void {
		this.config.maxColumnWidth = width;
		this.dimensions.setMaxColumnWidth(width);
	}

	setColumnSeparator(glyph: string): void {
		this.config.columnSeparator = glyph;
	}

	setRowSeparator(glyph: string): void {
		this.config.rowSeparator = glyph;
	}

	setCenterSeparator(glyph: string): void {
		this.config.centerSeparator = glyph;
	}

	setNewline(newline: string): void {
		this.config.newline = newline;
	}

	/** Draw a rule after every body row */
	setRowLine(enabled: boolean): void {
		this.config.rowLine = enabled;
	}

	/** Draw a rule under the header */
	setHeaderLine(enabled: boolean): void {
		this.config.headerLine = enabled;
	}

	/** Snapshot of the current settings; changing it does not affect the table */
	getConfig(): TableConfig {
		return resolveTableConfig(this.config);
	}

	/** Number of body rows appended so far */
	numLines(): number {
		return this.rows.length;
	}

	columnWidths(): number[] {
		return this.dimensions.columnWidths(this.columnCount());
	}

	/**
	 * Lay out the table without writing it.
	 */
	renderLines(): string[] {
		const count = this.columnCount();
		return renderGrid({
			config: this.config,
			widths: this.dimensions.columnWidths(count),
			tableWidth: this.dimensions.tableWidth(count),
			header: this.header,
			footer: this.footer,
			rows: this.rows,
			heights: this.rows.map((_, row) => this.dimensions.rowHeight(row)),
		});
	}

	/**
	 * Write the table to the sink, one line per write.
	 * @throws GridOutputError when the sink fails; the render stops there
	 */
	render(): void {
		const stop = log.time("render");
		const lines = this.renderLines();
		log.debug("Rendering table", {
			columns: this.columnCount(),
			rows: this.rows.length,
			lines: lines.length,
		});

		for (const [index, line] of lines.entries()) {
			try {
				this.sink.write(line + this.config.newline);
			} catch (error) {
				log.error("Failed to write table output", { line: index, error: describeError(error) });
				throw new GridOutputError(`Failed to write table line ${index + 1}: ${describeError(error)}`, {
					cause: error,
					line: index,
				});
			}
		}
		stop();
	}

	private columnCount(): number {
		return Math.max(this.header.length, this.dimensions.columnCount);
	}

	/**
	 * Measure a cell, wrap it to its column and record the resulting width.
	 */
	private layoutCell(text: string, column: number): string[] {
		const width = this.dimensions.observeColumn(column, displayWidth(text));
		const lines = this.config.autoWrapText
			? wrapText(text, width, { marker: this.config.breakMarker })
			: splitLines(text);
		this.dimensions.expandColumn(column, maxLineWidth(lines));
		return lines;
	}
}
