import type { ContributionAttribute, ContributionSegment } from "./contribution-segment";
import type { ControlAttribute, ControlSegment, ControlValue } from "./control-segment";
import type { ItemAttribute } from "./item-segment";
import type { ProblemMap } from "./validation";

export type SiciMode = "strict" | "lax";

export interface SiciOptions {
	/** "strict" or "lax", case and whitespace insensitive. Defaults to "lax". */
	mode?: string;
}

/**
 * Result of a parse that did not abort. `roundTrip` is undefined when the
 * input was rejected before tokenization.
 */
export interface ParseOutcome {
	valid: boolean;
	roundTrip: boolean | undefined;
}

export interface SiciProblems {
	item?: ProblemMap<ItemAttribute>;
	contribution?: ProblemMap<ContributionAttribute>;
	control?: ProblemMap<ControlAttribute>;
}

/** Sibling segments a segment may consult through its owning Sici. */
export interface SegmentOwner {
	readonly contribution: ContributionSegment;
	readonly control: ControlSegment;
}

export interface SiciFields {
	issn?: string;
	chronology?: string;
	enumeration?: string;
	volume?: string;
	issue?: string;
	supplOrIdx?: string;
	location?: string;
	titleCode?: string;
	localNumber?: string;
	csi?: ControlValue;
	dpi?: ControlValue;
	mfi?: string;
	version?: ControlValue;
}

export interface SiciSnapshot {
	mode: SiciMode;
	parsedString: string | null;
	sici: string;
	fields: SiciFields;
	valid: boolean;
	problems: SiciProblems | null;
}
