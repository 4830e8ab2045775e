import { describe, expect, it } from "vitest";
import { InvalidSeverityError } from "./errors";
import {
	isAtLeastAsSevere,
	labelToNumber,
	lookupLabel,
	numberToLabel,
	SEVERITY_LABELS,
} from "./severity";

describe("severity", () => {
	it("maps every priority to its label and back", () => {
		for (let n = 0; n <= 7; n++) {
			expect(labelToNumber(numberToLabel(n))).toBe(n);
		}
		expect(SEVERITY_LABELS).toEqual([
			"EMERG",
			"ALERT",
			"CRIT",
			"ERROR",
			"WARNING",
			"NOTICE",
			"INFO",
			"DEBUG",
		]);
	});

	it("accepts abbreviations and mixed case", () => {
		expect(labelToNumber("err")).toBe(3);
		expect(labelToNumber("Error")).toBe(3);
		expect(labelToNumber("WARN")).toBe(4);
		expect(labelToNumber("crit")).toBe(2);
		expect(labelToNumber("critical")).toBe(2);
		expect(labelToNumber("emergency")).toBe(0);
		expect(labelToNumber("panic")).toBe(0);
		expect(labelToNumber(" info ")).toBe(6);
	});

	it("accepts numeric codes as numbers and strings", () => {
		expect(labelToNumber(0)).toBe(0);
		expect(labelToNumber(7)).toBe(7);
		expect(labelToNumber("5")).toBe(5);
	});

	it("rejects unknown labels and out-of-range codes", () => {
		expect(() => labelToNumber("verbose")).toThrow(InvalidSeverityError);
		expect(() => labelToNumber(8)).toThrow(InvalidSeverityError);
		expect(() => labelToNumber(-1)).toThrow(InvalidSeverityError);
		expect(() => labelToNumber(2.5)).toThrow(InvalidSeverityError);
		expect(() => labelToNumber("9")).toThrow(InvalidSeverityError);
		expect(() => numberToLabel(8)).toThrow(InvalidSeverityError);
	});

	it("keeps the rejected input on the error", () => {
		try {
			labelToNumber("loud");
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidSeverityError);
			if (error instanceof InvalidSeverityError) {
				expect(error.input).toBe("loud");
				expect(error.code).toBe("INVALID_SEVERITY");
				expect(error.message).toBe(
					'Unknown severity: "loud". Expected 0-7 or one of emerg, alert, crit, err, warning, notice, info, debug',
				);
			}
		}
	});

	it("does not resolve numeric strings as labels", () => {
		expect(lookupLabel("3")).toBeUndefined();
		expect(lookupLabel("notice")).toBe(5);
	});

	it("treats lower numbers as more severe", () => {
		expect(isAtLeastAsSevere(0, 3)).toBe(true);
		expect(isAtLeastAsSevere(3, 3)).toBe(true);
		expect(isAtLeastAsSevere(4, 3)).toBe(false);
	});
});
