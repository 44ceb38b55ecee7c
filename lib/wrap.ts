import { displayWidth, sliceWidth } from "./width.js";

export interface WrapOptions {
	/** Appended to every non-final chunk of a hard-broken token (default: none) */
	marker?: string;
}

const NEWLINE_PATTERN = /\r?\n/;
const WHITESPACE_PATTERN = /\s+/;

/**
 * Split text on explicit line breaks only. Used when auto-wrap is disabled,
 * so the resulting lines may be wider than any column budget.
 */
export function splitLines(text: string): string[] {
	return text.split(NEWLINE_PATTERN);
}

/**
 * Break a token wider than `limit` into chunks that each fit the limit.
 */
function breakToken(token: string, limit: number, marker: string): string[] {
	const markerWidth = displayWidth(marker);
	const useMarker = marker.length > 0 && markerWidth < limit;
	const room = useMarker ? limit - markerWidth : limit;
	const chunks: string[] = [];

	let rest = token;
	while (displayWidth(rest) > limit) {
		const [head, tail] = sliceWidth(rest, room);
		if (displayWidth(tail) === 0) {
			// Single character wider than the limit; nothing left to carry over.
			break;
		}
		const headWidth = displayWidth(head);
		chunks.push(useMarker && headWidth <= room ? head + marker : head);
		rest = tail;
	}
	chunks.push(rest);
	return chunks;
}

/**
 * Word-wrap text into lines no wider than `limit` columns.
 *
 * Lines are filled greedily from whitespace-separated tokens; newlines count
 * as whitespace. Tokens wider than the limit are hard-broken. Text that
 * already fits on one line is returned untouched, spacing included.
 */
export function wrapText(text: string, limit: number, options: WrapOptions = {}): string[] {
	const budget = Math.max(1, Math.floor(limit));
	if (!NEWLINE_PATTERN.test(text) && displayWidth(text) <= budget) {
		return [text];
	}

	const tokens = text.split(WHITESPACE_PATTERN).filter((token) => token.length > 0);
	if (tokens.length === 0) return [""];

	const marker = options.marker ?? "";
	const lines: string[] = [];
	let current = "";
	let currentWidth = 0;

	for (const token of tokens) {
		const tokenWidth = displayWidth(token);

		if (tokenWidth > budget) {
			if (current.length > 0) lines.push(current);
			const chunks = breakToken(token, budget, marker);
			const last = chunks.pop() ?? "";
			lines.push(...chunks);
			current = last;
			currentWidth = displayWidth(last);
			continue;
		}

		if (current.length === 0) {
			current = token;
			currentWidth = tokenWidth;
		} else if (currentWidth + 1 + tokenWidth <= budget) {
			current += ` ${token}`;
			currentWidth += 1 + tokenWidth;
		} else {
			lines.push(current);
			current = token;
			currentWidth = tokenWidth;
		}
	}

	lines.push(current);
	return lines;
}

/**
 * Widest line in a block of wrapped lines.
 */
export function maxLineWidth(lines: readonly string[]): number {
	let max = 0;
	for (const line of lines) {
		const width = displayWidth(line);
		if (width > max) max = width;
	}
	return max;
}
