import { z } from "zod";
import { calculateCheckChar } from "./check-char";
import { ContributionSegment } from "./contribution-segment";
import { ControlSegment } from "./control-segment";
import { SiciError } from "./errors";
import { ItemSegment } from "./item-segment";
import { Scanner } from "./scanner";
import type {
	ParseOutcome,
	SegmentOwner,
	SiciMode,
	SiciOptions,
	SiciProblems,
	SiciSnapshot,
} from "./types";

/** Lowercases and strips all whitespace before matching a mode name. */
export const SiciModeSchema = z
	.string()
	.transform((value) => value.replace(/\s+/g, "").toLowerCase())
	.pipe(z.enum(["strict", "lax"]));

const ISSN_CHARS = /[0-9X-]/;
const CHRONOLOGY_CHARS = /[0-9/]/;
const VOLUME_ISSUE = /^([A-Z0-9/]+):([A-Z0-9/]+)(?::([+*]))?$/;
const LOCAL_NUMBER_ONLY = /^::(.+)$/;
const TITLE_CODE_FIRST = /^:([^:]+)(?::(.+))?$/;
const LOCATION_FIRST = /^([^:]+):([^:]+)(?::(.+))?$/;
/** Version digit followed by the check character at the very end. */
const TRAILING_VERSION = /;([0-9])-[0-9A-Z#]$/;

/**
 * A Serial Item and Contribution Identifier (ANSI/NISO Z39.56-1996).
 *
 * Attribute values are never rejected: a value that breaks the standard is
 * stored anyway and reported through `isValid()` / `listProblems()`. In
 * strict mode `parse()` throws where lax mode returns a negative outcome.
 */
export class Sici implements SegmentOwner {
	readonly mode: SiciMode;
	private parsed: string | undefined;
	private itemSegment: ItemSegment | undefined;
	private contributionSegment: ContributionSegment | undefined;
	private controlSegment: ControlSegment | undefined;

	constructor(options: SiciOptions = {}) {
		const result = SiciModeSchema.safeParse(options.mode ?? "lax");
		if (!result.success) {
			throw new SiciError(
				"INVALID_MODE",
				`Invalid mode "${options.mode}": expected "strict" or "lax"`,
			);
		}
		this.mode = result.data;
	}

	get item(): ItemSegment {
		if (!this.itemSegment) {
			this.itemSegment = new ItemSegment();
		}
		return this.itemSegment;
	}

	get contribution(): ContributionSegment {
		if (!this.contributionSegment) {
			this.contributionSegment = new ContributionSegment(this);
		}
		return this.contributionSegment;
	}

	get control(): ControlSegment {
		if (!this.controlSegment) {
			this.controlSegment = new ControlSegment(this);
		}
		return this.controlSegment;
	}

	/** The string last handed to `parse()`, if any. */
	get parsedString(): string | undefined {
		return this.parsed;
	}

	/**
	 * Disassemble `input` into the three segments, setting each attribute
	 * through its normal mutator. Segments are not reset first.
	 *
	 * @returns whether the result is valid, and whether `toString()`
	 * reproduces `input` exactly
	 * @throws SiciError in strict mode on empty input, an unsupported version
	 * or an invalid result
	 */
	parse(input: string | null | undefined): ParseOutcome {
		const strict = this.mode === "strict";

		if (!input) {
			if (strict) throw new SiciError("EMPTY_INPUT", "No string to parse");
			return { valid: false, roundTrip: undefined };
		}

		const version = input.match(TRAILING_VERSION)?.[1];
		if (version !== undefined && version !== "2") {
			if (strict) {
				throw new SiciError("UNSUPPORTED_VERSION", `Unhandled SICI version "${version}"`);
			}
			return { valid: false, roundTrip: undefined };
		}

		this.parsed = input;
		const scanner = new Scanner(input);

		this.parseItem(scanner);
		if (scanner.accept("<")) {
			this.parseContribution(scanner.takeUntil(">"));
			scanner.accept(">");
		}
		this.parseControl(scanner);

		const valid = this.isValid();
		if (strict && !valid) {
			throw new SiciError("INVALID_SICI", `Parsing failed: invalid SICI "${input}"`);
		}
		return { valid, roundTrip: input === this.toString() };
	}

	/** Canonical form including the check character. Does not check validity. */
	toString(): string {
		const prefix = this.toStringWithoutCheckChar();
		return prefix + calculateCheckChar(prefix);
	}

	checkChar(): string {
		return calculateCheckChar(this.toStringWithoutCheckChar());
	}

	/** Clears every segment. The mode is kept. */
	reset(): void {
		this.item.reset();
		this.contribution.reset();
		this.control.reset();
	}

	isValid(): boolean {
		return this.item.isValid() && this.contribution.isValid() && this.control.isValid();
	}

	/** Problems grouped by segment, or undefined when there are none. */
	listProblems(): SiciProblems | undefined {
		const problems: SiciProblems = {};
		if (!this.item.isValid()) problems.item = this.item.listProblems();
		if (!this.contribution.isValid()) {
			problems.contribution = this.contribution.listProblems();
		}
		if (!this.control.isValid()) problems.control = this.control.listProblems();
		return Object.keys(problems).length > 0 ? problems : undefined;
	}

	toJSON(): SiciSnapshot {
		const { item, contribution, control } = this;
		return {
			mode: this.mode,
			parsedString: this.parsed ?? null,
			sici: this.toString(),
			fields: {
				issn: item.issn,
				chronology: item.chronology,
				enumeration: item.enumeration,
				volume: item.volume,
				issue: item.issue,
				supplOrIdx: item.supplOrIdx,
				location: contribution.location,
				titleCode: contribution.titleCode,
				localNumber: contribution.localNumber,
				csi: control.csi,
				dpi: control.dpi,
				mfi: control.mfi,
				version: control.version,
			},
			valid: this.isValid(),
			problems: this.listProblems() ?? null,
		};
	}

	private toStringWithoutCheckChar(): string {
		return `${this.item}<${this.contribution}>${this.control}-`;
	}

	private parseItem(scanner: Scanner): void {
		const issn = scanner.takeWhile(ISSN_CHARS);
		if (issn) this.item.issn = issn;

		if (scanner.accept("(")) {
			this.item.chronology = scanner.takeWhile(CHRONOLOGY_CHARS);
		}
		scanner.accept(")");

		const enumeration = scanner.takeUntil("<");
		const volumeIssue = enumeration.match(VOLUME_ISSUE);
		if (volumeIssue) {
			const [, volume, issue, supplOrIdx] = volumeIssue;
			this.item.volume = volume;
			this.item.issue = issue;
			if (supplOrIdx) this.item.supplOrIdx = supplOrIdx;
		} else if (enumeration) {
			this.item.enumeration = enumeration;
		}
	}

	private parseContribution(raw: string): void {
		if (!raw) return;

		const localOnly = raw.match(LOCAL_NUMBER_ONLY);
		if (localOnly) {
			this.contribution.localNumber = localOnly[1];
			return;
		}

		const titleFirst = raw.match(TITLE_CODE_FIRST);
		if (titleFirst) {
			this.contribution.titleCode = titleFirst[1];
			if (titleFirst[2]) this.contribution.localNumber = titleFirst[2];
			return;
		}

		const locationFirst = raw.match(LOCATION_FIRST);
		if (locationFirst) {
			this.contribution.location = locationFirst[1];
			this.contribution.titleCode = locationFirst[2];
			if (locationFirst[3]) this.contribution.localNumber = locationFirst[3];
			return;
		}

		this.contribution.location = raw;
	}

	/** Fixed-width fields; missing characters at the end are tolerated. */
	private parseControl(scanner: Scanner): void {
		const csi = scanner.take(1);
		if (csi !== undefined) this.control.csi = csi;
		scanner.skip(); // "."

		const dpi = scanner.take(1);
		if (dpi !== undefined) this.control.dpi = dpi;
		scanner.skip(); // "."

		const mfi = scanner.take(2);
		if (mfi !== undefined) this.control.mfi = mfi;
		scanner.skip(); // ";"

		const version = scanner.take(1);
		if (version !== undefined) this.control.version = version;
	}
}
