/**
 * SICI check character (ANSI/NISO Z39.56-1996, Appendix B).
 *
 * Digits count 0-9, letters A-Z count 10-35 and every other character
 * counts 36. Weights alternate 3 and 1, starting with 3 on the rightmost
 * character of the prefix. The check value is the mod-37 complement of the
 * weighted sum; 36 is written as "#".
 */
const MODULUS = 37;
const OTHER_VALUE = 36;

function characterValue(char: string): number {
	const code = char.charCodeAt(0);
	if (code >= 48 && code <= 57) return code - 48; // 0-9
	if (code >= 65 && code <= 90) return code - 55; // A-Z
	return OTHER_VALUE;
}

function renderCheckValue(value: number): string {
	if (value < 10) return String(value);
	if (value < OTHER_VALUE) return String.fromCharCode(value + 55);
	return "#";
}

/**
 * Compute the check character for everything that precedes it, i.e. the
 * SICI up to and including the "-" after the version number.
 */
export function calculateCheckChar(prefix: string): string {
	let sum = 0;
	let weight = 3;
	for (let i = prefix.length - 1; i >= 0; i--) {
		sum += characterValue(prefix[i]) * weight;
		weight = weight === 3 ? 1 : 3;
	}
	return renderCheckValue((MODULUS - (sum % MODULUS)) % MODULUS);
}

const TRAILING_CHECK_CHAR = /-([0-9A-Z#])$/;

/** Returns the trailing check character of a complete SICI, if it has one. */
export function extractCheckChar(sici: string): string | undefined {
	return sici.match(TRAILING_CHECK_CHAR)?.[1];
}

/**
 * Verify the trailing check character of a complete SICI string.
 * Strings without a trailing check character are never valid.
 */
export function isValidCheckChar(sici: string): boolean {
	const checkChar = extractCheckChar(sici);
	if (checkChar === undefined) return false;
	return calculateCheckChar(sici.slice(0, -1)) === checkChar;
}
