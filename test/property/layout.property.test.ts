import { describe, it, expect } from "vitest";
import { fc } from "./setup.js";
import { arbAlignment, arbCellText, arbColoredText, arbLimit, arbRow, arbRows } from "./helpers.js";
import { Table } from "../../lib/table.js";
import { pad } from "../../lib/format.js";
import { createBufferSink } from "../../lib/sink.js";
import { displayWidth, stripAnsi } from "../../lib/width.js";
import { wrapText } from "../../lib/wrap.js";

function fitsOrIsSingleCharacter(line: string, limit: number): boolean {
	return displayWidth(line) <= limit || [...stripAnsi(line)].length === 1;
}

describe("wrapText property tests", () => {
	it("never produces a line wider than the limit except a lone wide character", () => {
		fc.assert(
			fc.property(fc.oneof(arbCellText, arbColoredText), arbLimit, (text, limit) => {
				const lines = wrapText(text, limit);
				expect(lines.length).toBeGreaterThanOrEqual(1);
				for (const line of lines) {
					expect(fitsOrIsSingleCharacter(line, limit)).toBe(true);
				}
				return true;
			}),
		);
	});

	it("keeps every non-whitespace character in order", () => {
		fc.assert(
			fc.property(arbCellText, arbLimit, (text, limit) => {
				const lines = wrapText(text, limit);
				expect(lines.join("").replace(/\s/g, "")).toBe(text.replace(/\s/g, ""));
				return true;
			}),
		);
	});

	it("is deterministic", () => {
		fc.assert(
			fc.property(arbCellText, arbLimit, (text, limit) => {
				expect(wrapText(text, limit)).toEqual(wrapText(text, limit));
				return true;
			}),
		);
	});
});

describe("pad property tests", () => {
	it("always yields exactly the target width when the text fits", () => {
		fc.assert(
			fc.property(arbCellText, fc.integer({ min: 0, max: 20 }), arbAlignment, (text, extra, alignment) => {
				const width = displayWidth(text) + extra;
				expect(displayWidth(pad(text, width, alignment))).toBe(width);
				return true;
			}),
		);
	});
});

describe("Table property tests", () => {
	it("never shrinks a column width across appends", () => {
		fc.assert(
			fc.property(arbRows, (rows) => {
				const table = new Table(createBufferSink());
				let previous: number[] = [];
				for (const row of rows) {
					table.append(row);
					const widths = table.columnWidths();
					expect(widths.length).toBeGreaterThanOrEqual(previous.length);
					previous.forEach((width, column) => {
						expect(widths[column]).toBeGreaterThanOrEqual(width);
					});
					previous = widths;
				}
				return true;
			}),
		);
	});

	it("renders identical output twice", () => {
		fc.assert(
			fc.property(arbRow, arbRows, (header, rows) => {
				const sink = createBufferSink();
				const table = new Table(sink);
				table.setHeader(header);
				table.appendBulk(rows);

				table.render();
				const first = sink.toString();
				sink.clear();
				table.render();
				expect(sink.toString()).toBe(first);
				return true;
			}),
		);
	});

	it("renders every grid line as wide as the border line", () => {
		fc.assert(
			fc.property(arbRow, arbRows, arbRow, fc.boolean(), (header, rows, footer, border) => {
				const table = new Table(createBufferSink());
				table.setHeader(header);
				table.setFooter(footer);
				table.setBorder(border);
				table.setRowLine(!border);
				table.appendBulk(rows);

				const widths = table.columnWidths();
				const expected = widths.reduce((sum, width) => sum + width + 3, 1);
				for (const line of table.renderLines()) {
					expect(displayWidth(line)).toBe(expected);
				}
				return true;
			}),
		);
	});
});
