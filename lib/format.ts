/**
 * Cell formatting: alignment padding and label auto-format.
 */

import { displayWidth, scanSegments } from "./width.js";

/**
 * Alignment modes for body, header and footer cells.
 */
export const Alignment = {
	DEFAULT: "default",
	CENTER: "center",
	RIGHT: "right",
	LEFT: "left",
} as const;

export type AlignmentMode = (typeof Alignment)[keyof typeof Alignment];

/** Alignment a classifier may resolve DEFAULT to */
export type ResolvedAlignment = Exclude<AlignmentMode, "default">;

/**
 * Decides how a cell under DEFAULT alignment is padded.
 * Receives the line with surrounding whitespace trimmed.
 */
export type AlignmentClassifier = (text: string) => ResolvedAlignment;

const NUMERIC_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)%?$/;

/**
 * Right-align numbers and percentages, left-align everything else.
 */
export const classifyNumeric: AlignmentClassifier = (text) =>
	NUMERIC_PATTERN.test(text) ? Alignment.RIGHT : Alignment.LEFT;

/** Classifier used for header and footer labels: DEFAULT means centered */
export const classifyLabel: AlignmentClassifier = () => Alignment.CENTER;

export function padLeft(text: string, width: number, fill = " "): string {
	const gap = width - displayWidth(text);
	return gap > 0 ? fill.repeat(gap) + text : text;
}

export function padRight(text: string, width: number, fill = " "): string {
	const gap = width - displayWidth(text);
	return gap > 0 ? text + fill.repeat(gap) : text;
}

/**
 * Center text in `width` columns; an odd leftover column goes on the right.
 */
export function padCenter(text: string, width: number, fill = " "): string {
	const gap = width - displayWidth(text);
	if (gap <= 0) return text;
	const left = Math.floor(gap / 2);
	return fill.repeat(left) + text + fill.repeat(gap - left);
}

/**
 * Pad a single line to exactly `width` columns. Lines already wider than
 * `width` are returned unchanged; nothing is truncated.
 */
export function pad(
	line: string,
	width: number,
	alignment: AlignmentMode,
	classify: AlignmentClassifier = classifyNumeric,
): string {
	const resolved = alignment === Alignment.DEFAULT ? classify(line.trim()) : alignment;
	switch (resolved) {
		case Alignment.CENTER:
			return padCenter(line, width);
		case Alignment.RIGHT:
			return padLeft(line, width);
		case Alignment.LEFT:
			return padRight(line, width);
	}
}

/**
 * Auto-format a header or footer label: underscores and dots become spaces,
 * surrounding whitespace is trimmed and letters are upper-cased one for
 * one (`ß` stays as it is). Escape
 * sequences are copied through unchanged.
 */
export function formatLabel(label: string): string {
	let formatted = "";
	for (const segment of scanSegments(label)) {
		if (segment.kind === "escape") {
			formatted += segment.value;
			continue;
		}
		const ch = segment.value === "_" || segment.value === "." ? " " : segment.value;
		// Labels are measured before formatting; a case mapping may not add characters.
		const upper = ch.toUpperCase();
		formatted += [...upper].length === 1 ? upper : ch;
	}
	return formatted.trim();
}
