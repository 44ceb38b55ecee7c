/**
 * Display width measurement for fixed-width grid output.
 *
 * ANSI escape sequences occupy no columns on screen, so they are recognised by
 * a small scanner and excluded from every width computation. The scanner never
 * splits an escape sequence: slicing and wrapping treat each one as a single
 * zero-width unit.
 */

import stringWidth from "string-width";

const ESC = "\u001b";
const CSI_C1 = "\u009b";
const BEL = "\u0007";

export type SegmentKind = "escape" | "text";

export interface Segment {
	kind: SegmentKind;
	/** Raw characters of the segment */
	value: string;
	/** Columns occupied on screen (always 0 for escapes) */
	width: number;
}

type ScanState = "normal" | "escape" | "csi" | "osc" | "osc-escape";

function isCsiFinal(ch: string): boolean {
	const code = ch.charCodeAt(0);
	return code >= 0x40 && code <= 0x7e;
}

function isIntermediate(ch: string): boolean {
	const code = ch.charCodeAt(0);
	return code >= 0x20 && code <= 0x2f;
}

/**
 * Split text into escape sequences and single visible characters.
 *
 * Recognised sequences: CSI (`ESC [` or `\u009b`, parameters, final byte),
 * OSC (`ESC ]` terminated by BEL or `ESC \`), and `ESC` followed by optional
 * intermediate bytes and a final byte. An unterminated sequence at the end of
 * the input is reported as a single escape segment.
 */
export function scanSegments(text: string): Segment[] {
	const segments: Segment[] = [];
	let state: ScanState = "normal";
	let pending = "";

	const closeEscape = () => {
		segments.push({ kind: "escape", value: pending, width: 0 });
		pending = "";
		state = "normal";
	};

	for (const ch of text) {
		switch (state) {
			case "normal":
				if (ch === ESC) {
					pending = ch;
					state = "escape";
				} else if (ch === CSI_C1) {
					pending = ch;
					state = "csi";
				} else {
					segments.push({ kind: "text", value: ch, width: stringWidth(ch) });
				}
				break;
			case "escape":
				pending += ch;
				if (ch === "[") {
					state = "csi";
				} else if (ch === "]") {
					state = "osc";
				} else if (!isIntermediate(ch)) {
					closeEscape();
				}
				break;
			case "csi":
				pending += ch;
				if (isCsiFinal(ch)) {
					closeEscape();
				}
				break;
			case "osc":
				pending += ch;
				if (ch === BEL) {
					closeEscape();
				} else if (ch === ESC) {
					state = "osc-escape";
				}
				break;
			case "osc-escape":
				pending += ch;
				if (ch === "\\") {
					closeEscape();
				} else if (ch !== ESC) {
					state = "osc";
				}
				break;
		}
	}

	if (pending.length > 0) {
		closeEscape();
	}
	return segments;
}

function hasEscapes(text: string): boolean {
	return text.includes(ESC) || text.includes(CSI_C1);
}

/**
 * Remove every escape sequence, leaving only the visible characters.
 */
export function stripAnsi(text: string): string {
	if (!hasEscapes(text)) return text;
	let visible = "";
	for (const segment of scanSegments(text)) {
		if (segment.kind === "text") visible += segment.value;
	}
	return visible;
}

/**
 * Number of terminal columns the text occupies.
 */
export function displayWidth(text: string): number {
	let width = 0;
	for (const segment of scanSegments(text)) {
		width += segment.width;
	}
	return width;
}

/**
 * Split off the longest head of `text` that fits in `width` columns.
 *
 * Escape sequences met before the budget is exhausted stay with the head. When
 * the very first visible character is wider than the budget it is taken anyway
 * so that callers always make progress.
 */
export function sliceWidth(text: string, width: number): [head: string, rest: string] {
	const segments = scanSegments(text);
	let head = "";
	let used = 0;
	let index = 0;

	for (const segment of segments) {
		if (segment.kind === "text") {
			if (used > 0 && used + segment.width > width) break;
			used += segment.width;
		}
		head += segment.value;
		index++;
	}

	const rest = segments
		.slice(index)
		.map((segment) => segment.value)
		.join("");
	return [head, rest];
}
