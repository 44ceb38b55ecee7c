/**
 * Grid renderer: turns resolved dimensions and wrapped cells into finished
 * text lines.
 *
 * Rendering walks a fixed sequence of regions; each region contributes zero
 * or more lines depending on the configuration. Nothing here mutates the
 * model, so rendering the same model twice yields the same lines.
 */

import { SPACE, type TableConfig } from "./config.js";
import { classifyLabel, formatLabel, pad, type AlignmentMode } from "./format.js";
import { wrapText } from "./wrap.js";

/** Wrapped lines of one cell */
export type WrappedCell = readonly string[];

/** One wrapped line block per cell */
export type WrappedRow = readonly WrappedCell[];

export interface FooterCell {
	/** Text as supplied; an empty string leaves the cell unboxed */
	text: string;
	lines: WrappedCell;
}

export interface RenderModel {
	config: Readonly<TableConfig>;
	/** Resolved width of every column, dense */
	widths: readonly number[];
	/** Length of a border line, used to wrap the caption */
	tableWidth: number;
	header: readonly WrappedCell[];
	footer: readonly FooterCell[];
	rows: readonly WrappedRow[];
	/** Resolved height of every body row */
	heights: readonly number[];
}

export const RENDER_REGIONS = [
	"top-border",
	"header",
	"header-rule",
	"body",
	"bottom-rule",
	"footer",
	"caption",
] as const;

export type RenderRegion = (typeof RENDER_REGIONS)[number];

type RegionRenderer = (model: RenderModel) => string[];

/**
 * Horizontal rule spanning every column.
 */
export function borderLine(model: RenderModel): string {
	const { centerSeparator, rowSeparator } = model.config;
	let line = centerSeparator;
	for (const width of model.widths) {
		line += rowSeparator.repeat(width + 2) + centerSeparator;
	}
	return line;
}

function blockHeight(cells: readonly WrappedCell[]): number {
	return cells.reduce((max, cell) => Math.max(max, cell.length), 0);
}

function labelText(model: RenderModel, line: string): string {
	return model.config.autoFormatHeaders ? formatLabel(line) : line;
}

function padLabel(model: RenderModel, line: string, column: number, alignment: AlignmentMode): string {
	const width = model.widths[column] ?? 0;
	return pad(labelText(model, line), width, alignment, classifyLabel);
}

/**
 * Join padded cells with the column separator and the configured edges.
 * `separatorAfter` may replace the glyph following a given cell.
 */
function composeLine(
	model: RenderModel,
	cells: readonly string[],
	separatorAfter?: (column: number, glyph: string) => string,
): string {
	const { border, columnSeparator } = model.config;
	const last = cells.length - 1;
	let line = border.left ? columnSeparator : SPACE;
	cells.forEach((cell, column) => {
		let glyph = column === last ? (border.right ? columnSeparator : SPACE) : columnSeparator;
		if (separatorAfter) glyph = separatorAfter(column, glyph);
		line += `${SPACE}${cell}${SPACE}${glyph}`;
	});
	return line;
}

function bodyAlignment(model: RenderModel, column: number): AlignmentMode {
	return model.config.columnAlignment[column] ?? model.config.alignment;
}

/** True when a row rule after the last body row already closes the body */
function bodyClosedByRowLine(model: RenderModel): boolean {
	return model.config.rowLine && model.rows.length > 0;
}

function renderTopBorder(model: RenderModel): string[] {
	return model.config.border.top ? [borderLine(model)] : [];
}

function renderHeader(model: RenderModel): string[] {
	if (model.header.length === 0) return [];
	const lines: string[] = [];
	const height = Math.max(1, blockHeight(model.header));
	for (let index = 0; index < height; index++) {
		const cells = model.widths.map((_, column) =>
			padLabel(model, model.header[column]?.[index] ?? "", column, model.config.headerAlignment),
		);
		lines.push(composeLine(model, cells));
	}
	return lines;
}

function renderHeaderRule(model: RenderModel): string[] {
	return model.header.length > 0 && model.config.headerLine ? [borderLine(model)] : [];
}

function renderBody(model: RenderModel): string[] {
	const { classifier, rowLine } = model.config;
	const lines: string[] = [];
	model.rows.forEach((row, rowIndex) => {
		const height = model.heights[rowIndex] ?? 0;
		for (let index = 0; index < height; index++) {
			const cells = model.widths.map((width, column) =>
				pad(row[column]?.[index] ?? "", width, bodyAlignment(model, column), classifier),
			);
			lines.push(composeLine(model, cells));
		}
		if (rowLine) lines.push(borderLine(model));
	});
	return lines;
}

function renderBottomRule(model: RenderModel): string[] {
	if (bodyClosedByRowLine(model)) return [];
	return model.config.border.bottom ? [borderLine(model)] : [];
}

function isEmptyFooter(model: RenderModel, column: number): boolean {
	return (model.footer[column]?.text ?? "").length === 0;
}

/**
 * Rule under the footer labels. Runs under leading empty footer cells are
 * left blank unless the left border is on, so the rule only boxes the
 * populated cells; a blank junction turns into the center glyph right
 * before the first populated cell.
 */
function footerRule(model: RenderModel): string {
	const { border, centerSeparator, rowSeparator } = model.config;
	const last = model.widths.length - 1;
	let line = "";
	let hasPrinted = false;

	model.widths.forEach((width, column) => {
		const empty = isEmptyFooter(model, column);
		if (!empty) hasPrinted = true;

		let fill = rowSeparator;
		let junction = centerSeparator;
		let blankJunction = empty && !border.right;
		if (blankJunction) junction = SPACE;

		if (column === 0) line += junction;

		if (empty) fill = SPACE;
		if (hasPrinted || border.left) {
			fill = rowSeparator;
			junction = centerSeparator;
			blankJunction = false;
		}

		if (blankJunction && column < last && !isEmptyFooter(model, column + 1)) {
			junction = centerSeparator;
		}

		line += fill.repeat(width + 2) + junction;
	});

	return line;
}

function renderFooter(model: RenderModel): string[] {
	if (model.footer.length === 0) return [];
	const { border, footerAlignment } = model.config;
	const lines: string[] = [];

	if (!border.bottom && !bodyClosedByRowLine(model)) {
		lines.push(borderLine(model));
	}

	const height = Math.max(1, blockHeight(model.footer.map((cell) => cell.lines)));
	for (let index = 0; index < height; index++) {
		const cells = model.widths.map((_, column) =>
			padLabel(model, model.footer[column]?.lines[index] ?? "", column, footerAlignment),
		);
		lines.push(
			composeLine(model, cells, (column, glyph) => (isEmptyFooter(model, column) ? SPACE : glyph)),
		);
	}

	lines.push(footerRule(model));
	return lines;
}

function renderCaption(model: RenderModel): string[] {
	const { caption, captionText } = model.config;
	if (!caption) return [];
	return wrapText(captionText, model.tableWidth);
}

const REGION_RENDERERS: Record<RenderRegion, RegionRenderer> = {
	"top-border": renderTopBorder,
	header: renderHeader,
	"header-rule": renderHeaderRule,
	body: renderBody,
	"bottom-rule": renderBottomRule,
	footer: renderFooter,
	caption: renderCaption,
};

/**
 * Lines contributed by a single region.
 */
export function renderRegion(model: RenderModel, region: RenderRegion): string[] {
	return REGION_RENDERERS[region](model);
}

/**
 * All lines of the table, region by region. A table without columns renders
 * nothing.
 */
export function renderGrid(model: RenderModel): string[] {
	if (model.widths.length === 0) return [];
	const lines: string[] = [];
	for (const region of RENDER_REGIONS) {
		lines.push(...renderRegion(model, region));
	}
	return lines;
}
