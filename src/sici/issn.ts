import type { ProblemMessages } from "./validation";

const ISSN_FORMAT = /^(\d{4})-(\d{3})([\dX])$/;

/** ISSN check digit: mod 11 over the first seven digits, weights 8 down to 2. */
export function issnCheckDigit(firstSeven: string): string {
	let sum = 0;
	for (let i = 0; i < 7; i++) {
		sum += Number(firstSeven[i]) * (8 - i);
	}
	const check = (11 - (sum % 11)) % 11;
	return check === 10 ? "X" : String(check);
}

/** Problems found in an ISSN, or null for a well-formed ISSN with a matching check digit. */
export function checkIssn(issn: string): ProblemMessages | null {
	const match = issn.match(ISSN_FORMAT);
	if (!match) return ["invalid format"];
	if (issnCheckDigit(match[1] + match[2]) !== match[3]) {
		return ["check digit mismatch"];
	}
	return null;
}
