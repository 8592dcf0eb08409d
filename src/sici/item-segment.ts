import { checkIssn } from "./issn";
import { type ProblemMap, ValidationTracker } from "./validation";

export const ITEM_ATTRIBUTES = [
	"issn",
	"chronology",
	"enumeration",
	"volume",
	"issue",
	"supplOrIdx",
] as const;

export type ItemAttribute = (typeof ITEM_ATTRIBUTES)[number];

/**
 * The item segment: which serial (ISSN), which issue of it (chronology and
 * enumeration). The enumeration is kept either verbatim or split into
 * volume, issue and an optional supplement/index marker.
 */
export class ItemSegment {
	private readonly values: Partial<Record<ItemAttribute, string>> = {};
	private readonly tracker = new ValidationTracker<ItemAttribute>();

	get issn(): string | undefined {
		return this.values.issn;
	}

	set issn(value: string) {
		this.values.issn = value;
		const problems = checkIssn(value);
		if (problems) {
			this.tracker.record("issn", problems);
		} else {
			this.tracker.clear("issn");
		}
	}

	get chronology(): string | undefined {
		return this.values.chronology;
	}

	set chronology(value: string) {
		this.values.chronology = value;
	}

	get enumeration(): string | undefined {
		return this.values.enumeration;
	}

	set enumeration(value: string) {
		this.values.enumeration = value;
	}

	get volume(): string | undefined {
		return this.values.volume;
	}

	set volume(value: string) {
		this.values.volume = value;
	}

	get issue(): string | undefined {
		return this.values.issue;
	}

	set issue(value: string) {
		this.values.issue = value;
	}

	/** "+" marks a supplement, "*" an index. */
	get supplOrIdx(): string | undefined {
		return this.values.supplOrIdx;
	}

	set supplOrIdx(value: string) {
		this.values.supplOrIdx = value;
	}

	has(attr: ItemAttribute): boolean {
		return this.values[attr] !== undefined;
	}

	clear(attr: ItemAttribute): void {
		delete this.values[attr];
		this.tracker.clear(attr);
	}

	reset(): void {
		for (const attr of ITEM_ATTRIBUTES) {
			delete this.values[attr];
		}
		this.tracker.clearAll();
	}

	isValid(): boolean {
		return this.tracker.isClean();
	}

	listProblems(): ProblemMap<ItemAttribute> {
		return this.tracker.list();
	}

	toString(): string {
		const { issn, chronology, enumeration, volume, issue, supplOrIdx } = this.values;
		let str = issn ?? "";
		if (chronology !== undefined) {
			str += `(${chronology})`;
		}
		if (volume !== undefined && issue !== undefined) {
			str += `${volume}:${issue}`;
			if (supplOrIdx !== undefined) {
				str += `:${supplOrIdx}`;
			}
		} else if (enumeration !== undefined) {
			str += enumeration;
		}
		return str;
	}
}
