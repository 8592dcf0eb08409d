export { buildSici } from "./build";
export { Sici, SiciModeSchema } from "./sici";
export { calculateCheckChar, extractCheckChar, isValidCheckChar } from "./check-char";
export { ContributionSegment, TITLE_CODE_CHARS } from "./contribution-segment";
export type { ContributionAttribute } from "./contribution-segment";
export { ControlSegment, MFI_CODES, SUPPORTED_VERSION } from "./control-segment";
export type { ControlAttribute, ControlValue } from "./control-segment";
export { SiciError } from "./errors";
export type { SiciErrorCode } from "./errors";
export { ItemSegment } from "./item-segment";
export type { ItemAttribute } from "./item-segment";
export { checkIssn, issnCheckDigit } from "./issn";
export { ValidationTracker } from "./validation";
export type { ProblemMap, ProblemMessages } from "./validation";
export type {
	ParseOutcome,
	SiciFields,
	SiciMode,
	SiciOptions,
	SiciProblems,
	SiciSnapshot,
} from "./types";

