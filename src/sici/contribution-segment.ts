import type { SegmentOwner } from "./types";
import { type ProblemMap, ValidationTracker } from "./validation";

export const CONTRIBUTION_ATTRIBUTES = ["location", "titleCode", "localNumber"] as const;

export type ContributionAttribute = (typeof CONTRIBUTION_ATTRIBUTES)[number];

/**
 * Characters allowed in contribution data: uppercase letters, digits and the
 * non-separator punctuation of the SICI character set.
 */
export const TITLE_CODE_CHARS = /^[A-Z0-9#$%&'()*+,\-./=?@[\]^_]+$/;

const MAX_TITLE_CODE_LENGTH = 6;

/**
 * The contribution segment: an article or other part of the item. It may be
 * entirely empty, in which case the SICI describes the item itself.
 */
export class ContributionSegment {
	private readonly values: Partial<Record<ContributionAttribute, string>> = {};
	private readonly tracker = new ValidationTracker<ContributionAttribute>();

	constructor(private readonly owner: SegmentOwner) {}

	/** Where the contribution sits in the item, typically a page range. */
	get location(): string | undefined {
		return this.values.location;
	}

	set location(value: string) {
		this.values.location = value;
		this.checkCharacters("location", value);
	}

	/** Code of up to six characters derived from the contribution's title. */
	get titleCode(): string | undefined {
		return this.values.titleCode;
	}

	set titleCode(value: string) {
		this.values.titleCode = value;
		const problems: string[] = [];
		if (value.length > MAX_TITLE_CODE_LENGTH) {
			problems.push(`contains more than ${MAX_TITLE_CODE_LENGTH} characters`);
		}
		if (!TITLE_CODE_CHARS.test(value)) {
			problems.push("contains invalid characters");
		}
		const [first, ...rest] = problems;
		if (first !== undefined) {
			this.tracker.record("titleCode", [first, ...rest]);
		} else {
			this.tracker.clear("titleCode");
		}
	}

	get localNumber(): string | undefined {
		return this.values.localNumber;
	}

	set localNumber(value: string) {
		this.values.localNumber = value;
		this.checkCharacters("localNumber", value);
	}

	has(attr: ContributionAttribute): boolean {
		return this.values[attr] !== undefined;
	}

	clear(attr: ContributionAttribute): void {
		delete this.values[attr];
		this.tracker.clear(attr);
	}

	/** Clears the segment and lets the control segment re-derive its csi. */
	reset(): void {
		for (const attr of CONTRIBUTION_ATTRIBUTES) {
			delete this.values[attr];
		}
		this.tracker.clearAll();
		this.owner.control.invalidateCsi();
	}

	isValid(): boolean {
		return this.tracker.isClean();
	}

	listProblems(): ProblemMap<ContributionAttribute> {
		return this.tracker.list();
	}

	toString(): string {
		const { location, titleCode, localNumber } = this.values;
		let str = location ?? "";
		if (titleCode !== undefined) {
			str += `:${titleCode}`;
		}
		if (localNumber !== undefined) {
			str += location !== undefined || titleCode !== undefined ? ":" : "::";
			str += localNumber;
		}
		return str;
	}

	private checkCharacters(attr: ContributionAttribute, value: string): void {
		if (TITLE_CODE_CHARS.test(value)) {
			this.tracker.clear(attr);
		} else {
			this.tracker.record(attr, ["contains invalid characters"]);
		}
	}
}
