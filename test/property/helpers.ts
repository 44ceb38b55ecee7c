import { Alignment } from "../../lib/format.js";
import { fc } from "./setup.js";

const WORD_CHARS = ["a", "b", "c", "x", "y", "z", "1", "2", "中"] as const;
const TEXT_CHARS = [...WORD_CHARS, " ", " ", "\n"] as const;

function joined(chars: readonly string[], maxLength: number): fc.Arbitrary<string> {
	return fc.array(fc.constantFrom(...chars), { maxLength }).map((parts) => parts.join(""));
}

/** Free text mixing words, spaces, newlines and wide characters */
export const arbCellText = joined(TEXT_CHARS, 60);

/** Free text wrapped in a color escape sequence */
export const arbColoredText = arbCellText.map((text) => `\u001b[32m${text}\u001b[0m`);

/** Printable ASCII without whitespace */
export const arbAsciiWord = fc
	.array(fc.constantFrom("a", "b", "c", "d", "7", "-", "."), { minLength: 1, maxLength: 12 })
	.map((parts) => parts.join(""));

export const arbLimit = fc.integer({ min: 1, max: 40 });

export const arbRow = fc.array(arbCellText, { minLength: 0, maxLength: 5 });

export const arbRows = fc.array(arbRow, { minLength: 1, maxLength: 8 });

export const arbAlignment = fc.constantFrom(...Object.values(Alignment));
