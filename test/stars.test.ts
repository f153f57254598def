import { describe, it, expect } from "vitest";
import bigInt from "big-integer";
import { formatStars, isAffordable, starsValue, toStarsAmount } from "../src/stars.js";

describe("toStarsAmount", () => {
    it("reads a StarsAmount with nanos", () => {
        expect(toStarsAmount({ amount: bigInt(12), nanos: 500_000_000 })).toEqual({ amount: 12, nanos: 500_000_000 });
    });

    it("reads a StarsAmount without nanos", () => {
        expect(toStarsAmount({ amount: bigInt(7) })).toEqual({ amount: 7, nanos: 0 });
    });

    it("reads a bare long", () => {
        expect(toStarsAmount(bigInt(250))).toEqual({ amount: 250, nanos: 0 });
    });

    it("reads a plain number", () => {
        expect(toStarsAmount(42)).toEqual({ amount: 42, nanos: 0 });
    });

    it("treats a missing amount as zero", () => {
        expect(toStarsAmount(undefined)).toEqual({ amount: 0, nanos: 0 });
        expect(toStarsAmount(null)).toEqual({ amount: 0, nanos: 0 });
    });
});

describe("starsValue", () => {
    it("folds nanos into the decimal value", () => {
        expect(starsValue({ amount: 12, nanos: 500_000_000 })).toBe(12.5);
        expect(starsValue({ amount: 3, nanos: 0 })).toBe(3);
    });
});

describe("isAffordable", () => {
    it("accepts a balance equal to the price", () => {
        expect(isAffordable(100, 100)).toBe(true);
    });

    it("rejects a balance one star short", () => {
        expect(isAffordable(99, 100)).toBe(false);
    });

    it("rejects a balance a fraction short", () => {
        expect(isAffordable(starsValue({ amount: 99, nanos: 999_999_999 }), 100)).toBe(false);
    });
});

describe("formatStars", () => {
    it("rounds to whole stars", () => {
        expect(formatStars(250)).toBe("250");
        expect(formatStars(12.5)).toBe("13");
    });
});
