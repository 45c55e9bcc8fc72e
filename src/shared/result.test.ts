import { describe, expect, it } from "vitest";
import { err, isErr, isOk, ok, unwrap } from "./result.js";

describe("Result", () => {
	it("ok wraps a value", () => {
		const r = ok(42);
		expect(r).toEqual({ ok: true, value: 42 });
		expect(isOk(r)).toBe(true);
		expect(isErr(r)).toBe(false);
	});

	it("err wraps an error", () => {
		const r = err("invalid transition");
		expect(r).toEqual({ ok: false, error: "invalid transition" });
		expect(isErr(r)).toBe(true);
	});

	describe("unwrap", () => {
		it("returns the value of an ok result", () => {
			expect(unwrap(ok("connected"))).toBe("connected");
		});

		it("throws an Error payload as is", () => {
			const error = new RangeError("out of range");
			expect(() => unwrap(err(error))).toThrow(error);
		});

		it("wraps a non-Error payload", () => {
			expect(() => unwrap(err("already_terminal"))).toThrow("unwrap on err: already_terminal");
		});
	});
});
