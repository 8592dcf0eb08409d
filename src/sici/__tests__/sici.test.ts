import { describe, expect, it } from "vitest";
import { buildSici } from "../build";
import { SiciError } from "../errors";
import { Sici } from "../sici";

function expectSiciError(fn: () => unknown, code: SiciError["code"]) {
	try {
		fn();
	} catch (error) {
		expect(error).toBeInstanceOf(SiciError);
		if (error instanceof SiciError) expect(error.code).toBe(code);
		return;
	}
	expect.fail(`expected SiciError ${code}`);
}

describe("Sici construction", () => {
	it("defaults to lax mode", () => {
		expect(new Sici().mode).toBe("lax");
	});

	it("normalizes case and whitespace in the mode", () => {
		expect(new Sici({ mode: " STRICT " }).mode).toBe("strict");
		expect(new Sici({ mode: "L a X" }).mode).toBe("lax");
	});

	it("throws on an unknown mode", () => {
		expectSiciError(() => new Sici({ mode: "loose" }), "INVALID_MODE");
	});

	it("has no parsed string before parse()", () => {
		expect(new Sici().parsedString).toBeUndefined();
	});
});

describe("Sici.parse", () => {
	it("disassembles an item SICI and round-trips it", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<>1.0.TX;2-S");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.parsedString).toBe("0066-4200(1990)25<>1.0.TX;2-S");
		expect(sici.item.issn).toBe("0066-4200");
		expect(sici.item.chronology).toBe("1990");
		expect(sici.item.enumeration).toBe("25");
		expect(sici.item.has("volume")).toBe(false);
		expect(sici.contribution.toString()).toBe("");
		expect(sici.control.csi).toBe(1);
		expect(sici.control.dpi).toBe(0);
		expect(sici.control.mfi).toBe("TX");
		expect(sici.control.version).toBe(2);
	});

	it("splits volume, issue and contribution", () => {
		const sici = new Sici();
		const outcome = sici.parse("0095-4403(199502/03)21:3<12:WATIIB>2.0.TX;2-J");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.item.volume).toBe("21");
		expect(sici.item.issue).toBe("3");
		expect(sici.item.has("enumeration")).toBe(false);
		expect(sici.contribution.location).toBe("12");
		expect(sici.contribution.titleCode).toBe("WATIIB");
		expect(sici.control.csi).toBe(2);
	});

	it("is valid without round trip when the check character is missing", () => {
		const sici = new Sici();
		const outcome = sici.parse("0361-526X(2011)17:3/4<60-61:AAAAAA>2.0.ZU;2-");

		expect(outcome).toEqual({ valid: true, roundTrip: false });
		expect(sici.contribution.location).toBe("60-61");
		expect(sici.contribution.titleCode).toBe("AAAAAA");
		expect(sici.control.isExplicit("csi")).toBe(true);
		expect(sici.toString()).toBe("0361-526X(2011)17:3/4<60-61:AAAAAA>2.0.ZU;2-0");
	});

	it("reports an ISSN with a wrong check digit", () => {
		const sici = new Sici();
		const outcome = sici.parse("0361-5265(2011)17:3/4<60-61:AAAAAA>2.0.ZU;2-");

		expect(outcome).toEqual({ valid: false, roundTrip: false });
		expect(sici.listProblems()).toEqual({ item: { issn: ["check digit mismatch"] } });
	});

	it("decomposes a local-number-only contribution", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<::7>3.0.ZU;2-N");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.contribution.localNumber).toBe("7");
		expect(sici.contribution.has("location")).toBe(false);
		expect(sici.contribution.has("titleCode")).toBe(false);
	});

	it("decomposes a title code with a local number", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<:ABC:9>3.0.TX;2-V");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.contribution.titleCode).toBe("ABC");
		expect(sici.contribution.localNumber).toBe("9");
	});

	it("decomposes location, title code and local number", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<60-61:AAAAAA:99>3.0.TX;2-R");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.contribution.location).toBe("60-61");
		expect(sici.contribution.titleCode).toBe("AAAAAA");
		expect(sici.contribution.localNumber).toBe("99");
		expect(sici.control.isExplicit("csi")).toBe(true);
		expect(sici.control.csi).toBe(3);
		expect(sici.toString()).toBe("0066-4200(1990)25<60-61:AAAAAA:99>3.0.TX;2-R");
	});

	it("keeps a contribution without colons as its location", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<12>2.0.TX;2-I");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.contribution.location).toBe("12");
	});

	it("recognizes a supplement marker", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25:3:+<>1.0.TX;2-W");

		expect(outcome).toEqual({ valid: true, roundTrip: true });
		expect(sici.item.volume).toBe("25");
		expect(sici.item.issue).toBe("3");
		expect(sici.item.supplOrIdx).toBe("+");
	});

	it("keeps enumerations that are not volume:issue verbatim", () => {
		const sici = new Sici();
		sici.parse("0066-4200(1990)25a:3<>1.0.TX;2-");
		expect(sici.item.enumeration).toBe("25a:3");
		expect(sici.item.has("volume")).toBe(false);
	});

	it("tolerates a truncated control segment", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<>1");

		expect(outcome).toEqual({ valid: true, roundTrip: false });
		expect(sici.control.isExplicit("csi")).toBe(true);
		expect(sici.control.isExplicit("dpi")).toBe(false);
		expect(sici.control.toString()).toBe("1.0.ZU;2");
	});

	it("skips an MFI when only one character is left", () => {
		const sici = new Sici();
		sici.parse("0066-4200(1990)25<>1.0.T");
		expect(sici.control.isExplicit("mfi")).toBe(false);
		expect(sici.control.mfi).toBe("ZU");
	});

	it("stores invalid control characters and reports them", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<>X.0.TX;2-S");

		expect(outcome.valid).toBe(false);
		expect(sici.control.csi).toBe("X");
		expect(sici.listProblems()).toEqual({
			control: { csi: ["value not in allowed range (1|2|3)"] },
		});
	});

	it("flags a version that is not followed by a check character", () => {
		const sici = new Sici();
		const outcome = sici.parse("0066-4200(1990)25<>1.0.TX;3-");

		expect(outcome).toEqual({ valid: false, roundTrip: false });
		expect(sici.control.version).toBe(3);
		expect(sici.toString()).toBe("0066-4200(1990)25<>1.0.TX;3-R");
	});

	describe("lax mode", () => {
		it("returns a negative outcome for empty input", () => {
			const sici = new Sici();
			expect(sici.parse("")).toEqual({ valid: false, roundTrip: undefined });
			expect(sici.parse(undefined)).toEqual({ valid: false, roundTrip: undefined });
			expect(sici.parsedString).toBeUndefined();
		});

		it("returns a negative outcome for an unsupported version", () => {
			const sici = new Sici();
			expect(sici.parse("0066-4200(1990)25<>1.0.TX;3-R")).toEqual({
				valid: false,
				roundTrip: undefined,
			});
			expect(sici.item.has("issn")).toBe(false);
		});
	});

	describe("strict mode", () => {
		it("throws on empty input", () => {
			const sici = new Sici({ mode: "strict" });
			expectSiciError(() => sici.parse(""), "EMPTY_INPUT");
		});

		it("throws on an unsupported version before touching any attribute", () => {
			const sici = new Sici({ mode: "strict" });
			expectSiciError(() => sici.parse("0066-4200(1990)25<>1.0.TX;3-R"), "UNSUPPORTED_VERSION");
			expect(sici.item.has("issn")).toBe(false);
			expect(sici.parsedString).toBeUndefined();
		});

		it("throws when the parsed SICI is invalid, leaving the parsed state", () => {
			const sici = new Sici({ mode: "strict" });
			expectSiciError(
				() => sici.parse("0361-5265(2011)17:3/4<60-61:AAAAAA>2.0.ZU;2-"),
				"INVALID_SICI",
			);
			expect(sici.item.issn).toBe("0361-5265");
		});

		it("parses a valid SICI like lax mode", () => {
			const sici = new Sici({ mode: "strict" });
			expect(sici.parse("0066-4200(1990)25<>1.0.TX;2-S")).toEqual({
				valid: true,
				roundTrip: true,
			});
		});
	});
});

describe("Sici serialization", () => {
	it("renders an empty SICI from defaults", () => {
		expect(new Sici().toString()).toBe("<>1.0.ZU;2-K");
	});

	it("derives csi 3 for a local number and appends the check character", () => {
		const sici = new Sici();
		sici.item.issn = "0066-4200";
		sici.item.chronology = "1990";
		sici.item.enumeration = "25";
		sici.contribution.localNumber = "7";

		expect(sici.toString()).toBe("0066-4200(1990)25<::7>3.0.ZU;2-N");
		expect(sici.checkChar()).toBe("N");
	});

	it("returns the same string on repeated calls", () => {
		const sici = new Sici();
		sici.item.issn = "0066-4200";
		sici.contribution.titleCode = "ABC";
		expect(sici.toString()).toBe(sici.toString());
	});

	it("renders '#' check characters", () => {
		const sici = new Sici();
		sici.item.issn = "0066-4200";
		sici.item.chronology = "1990";
		sici.item.enumeration = "7";
		sici.control.mfi = "TX";
		expect(sici.toString()).toBe("0066-4200(1990)7<>1.0.TX;2-#");
	});
});

describe("Sici.reset", () => {
	it("clears every segment and re-derives csi as 1", () => {
		const sici = new Sici();
		sici.parse("0361-5265(2011)17:3/4<60-61:AAAAAA:99>3.1.TX;2-");
		expect(sici.isValid()).toBe(false);

		sici.reset();

		expect(sici.isValid()).toBe(true);
		expect(sici.listProblems()).toBeUndefined();
		expect(sici.item.has("issn")).toBe(false);
		expect(sici.item.has("volume")).toBe(false);
		expect(sici.contribution.has("location")).toBe(false);
		expect(sici.contribution.has("localNumber")).toBe(false);
		expect(sici.control.csi).toBe(1);
		expect(sici.toString()).toBe("<>1.0.ZU;2-K");
	});

	it("keeps the mode", () => {
		const sici = new Sici({ mode: "strict" });
		sici.reset();
		expect(sici.mode).toBe("strict");
	});
});

describe("Sici.listProblems / toJSON", () => {
	it("groups problems by segment", () => {
		const sici = new Sici();
		sici.item.issn = "1234";
		sici.contribution.titleCode = "ABCDEFG";
		sici.control.dpi = 7;
		expect(sici.listProblems()).toEqual({
			item: { issn: ["invalid format"] },
			contribution: { titleCode: ["contains more than 6 characters"] },
			control: { dpi: ["value not in allowed range (0|1|2|3)"] },
		});
	});

	it("snapshots fields with defaults resolved", () => {
		const sici = new Sici();
		sici.parse("0066-4200(1990)25<>1.0.TX;2-S");
		expect(sici.toJSON()).toEqual({
			mode: "lax",
			parsedString: "0066-4200(1990)25<>1.0.TX;2-S",
			sici: "0066-4200(1990)25<>1.0.TX;2-S",
			fields: {
				issn: "0066-4200",
				chronology: "1990",
				enumeration: "25",
				csi: 1,
				dpi: 0,
				mfi: "TX",
				version: 2,
			},
			valid: true,
			problems: null,
		});
	});
});

describe("buildSici", () => {
	it("sets fields through the mutators", () => {
		const sici = buildSici({
			issn: "0095-4403",
			chronology: "199502/03",
			volume: "21",
			issue: "3",
			location: "12",
			titleCode: "WATIIB",
			mfi: "TX",
		});
		expect(sici.toString()).toBe("0095-4403(199502/03)21:3<12:WATIIB>2.0.TX;2-J");
		expect(sici.isValid()).toBe(true);
	});

	it("records problems for invalid values", () => {
		const sici = buildSici({ csi: 5, version: "1" });
		expect(sici.listProblems()).toEqual({
			control: {
				csi: ["value not in allowed range (1|2|3)"],
				version: ['unsupported version number (i.e. not "2")'],
			},
		});
	});

	it("passes the mode through", () => {
		expect(buildSici({}, { mode: "strict" }).mode).toBe("strict");
	});
});
