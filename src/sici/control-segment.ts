import type { SegmentOwner } from "./types";
import { type ProblemMap, ValidationTracker } from "./validation";

export const CONTROL_ATTRIBUTES = ["csi", "dpi", "mfi", "version"] as const;

export type ControlAttribute = (typeof CONTROL_ATTRIBUTES)[number];

/** Numeric control codes; anything that is not a single digit is kept as given. */
export type ControlValue = number | string;

type FieldState<T> =
	| { kind: "unset" }
	| { kind: "default"; value: T }
	| { kind: "explicit"; value: T };

export const SUPPORTED_VERSION = 2;

/**
 * Medium/format identifiers:
 * CD optical disc, CF magnetic disk, CO online, CT magnetic tape,
 * HD microfilm, HE microfiche, SC sound recording, TB braille,
 * TH hardbound, TL looseleaf, TS softcover, TX printed text,
 * VX video recording, ZN multiple forms, ZU unknown, ZZ other.
 */
export const MFI_CODES = /^(?:C[DFOT]|H[DE]|SC|T[BHLSX]|VX|Z[NUZ])$/;

const DEFAULT_DPI = 0;
const DEFAULT_MFI = "ZU";

function normalizeControlValue(value: ControlValue): ControlValue {
	return typeof value === "string" && /^\d$/.test(value) ? Number(value) : value;
}

function inRange(value: ControlValue, allowed: readonly number[]): boolean {
	return typeof value === "number" && allowed.includes(value);
}

/**
 * The control segment: code structure (csi), derivative part (dpi),
 * medium/format (mfi) and standard version. Every field falls back to a
 * default, so the segment always renders completely.
 *
 * The csi default depends on the contribution segment and is cached on first
 * read; `invalidateCsi()` drops the cached value.
 */
export class ControlSegment {
	private csiState: FieldState<ControlValue> = { kind: "unset" };
	private dpiState: FieldState<ControlValue> = { kind: "unset" };
	private mfiState: FieldState<string> = { kind: "unset" };
	private versionState: FieldState<ControlValue> = { kind: "unset" };
	private readonly tracker = new ValidationTracker<ControlAttribute>();

	constructor(private readonly owner: SegmentOwner) {}

	/** 1 = serial item, 2 = contribution, 3 = contribution with local numbering. */
	get csi(): ControlValue {
		if (this.csiState.kind === "unset") {
			this.csiState = { kind: "default", value: this.deriveCsi() };
		}
		return this.csiState.value;
	}

	set csi(value: ControlValue) {
		const normalized = normalizeControlValue(value);
		this.csiState = { kind: "explicit", value: normalized };
		if (inRange(normalized, [1, 2, 3])) {
			this.tracker.clear("csi");
		} else {
			this.tracker.record("csi", ["value not in allowed range (1|2|3)"]);
		}
	}

	/** 0 = the item or contribution itself, 1 = its ToC, 2 = its index, 3 = its abstract. */
	get dpi(): ControlValue {
		if (this.dpiState.kind === "unset") {
			this.dpiState = { kind: "default", value: DEFAULT_DPI };
		}
		return this.dpiState.value;
	}

	set dpi(value: ControlValue) {
		const normalized = normalizeControlValue(value);
		this.dpiState = { kind: "explicit", value: normalized };
		if (inRange(normalized, [0, 1, 2, 3])) {
			this.tracker.clear("dpi");
		} else {
			this.tracker.record("dpi", ["value not in allowed range (0|1|2|3)"]);
		}
	}

	get mfi(): string {
		if (this.mfiState.kind === "unset") {
			this.mfiState = { kind: "default", value: DEFAULT_MFI };
		}
		return this.mfiState.value;
	}

	set mfi(value: string) {
		this.mfiState = { kind: "explicit", value };
		if (MFI_CODES.test(value)) {
			this.tracker.clear("mfi");
		} else {
			this.tracker.record("mfi", ["unknown identifier"]);
		}
	}

	get version(): ControlValue {
		if (this.versionState.kind === "unset") {
			this.versionState = { kind: "default", value: SUPPORTED_VERSION };
		}
		return this.versionState.value;
	}

	set version(value: ControlValue) {
		const normalized = normalizeControlValue(value);
		this.versionState = { kind: "explicit", value: normalized };
		if (normalized === SUPPORTED_VERSION) {
			this.tracker.clear("version");
		} else {
			this.tracker.record("version", [
				`unsupported version number (i.e. not "${SUPPORTED_VERSION}")`,
			]);
		}
	}

	/** True once a value is held, explicit or a default that has been read. */
	has(attr: ControlAttribute): boolean {
		return this.state(attr).kind !== "unset";
	}

	/** True only for values set through the mutators. */
	isExplicit(attr: ControlAttribute): boolean {
		return this.state(attr).kind === "explicit";
	}

	clear(attr: ControlAttribute): void {
		switch (attr) {
			case "csi":
				this.csiState = { kind: "unset" };
				break;
			case "dpi":
				this.dpiState = { kind: "unset" };
				break;
			case "mfi":
				this.mfiState = { kind: "unset" };
				break;
			case "version":
				this.versionState = { kind: "unset" };
				break;
		}
		this.tracker.clear(attr);
	}

	/** Forget the csi, explicit or derived, so the next read derives it afresh. */
	invalidateCsi(): void {
		this.clear("csi");
	}

	reset(): void {
		for (const attr of CONTROL_ATTRIBUTES) {
			this.clear(attr);
		}
	}

	isValid(): boolean {
		return this.tracker.isClean();
	}

	listProblems(): ProblemMap<ControlAttribute> {
		return this.tracker.list();
	}

	toString(): string {
		return `${this.csi}.${this.dpi}.${this.mfi};${this.version}`;
	}

	private state(attr: ControlAttribute): FieldState<ControlValue> {
		switch (attr) {
			case "csi":
				return this.csiState;
			case "dpi":
				return this.dpiState;
			case "mfi":
				return this.mfiState;
			case "version":
				return this.versionState;
		}
	}

	private deriveCsi(): number {
		const contribution = this.owner.contribution;
		if (contribution.has("localNumber")) return 3;
		if (contribution.has("location") || contribution.has("titleCode")) return 2;
		return 1;
	}
}
