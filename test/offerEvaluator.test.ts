import { describe, it, expect } from "vitest";
import { isEligible, selectCandidates } from "../src/offerEvaluator.js";
import type { GiftOffer } from "../src/types.js";
import { offer } from "./fakePlatform.js";

/** Детерминированный набор каталогов с разными комбинациями флагов и цен */
function makeCatalogs(): GiftOffer[][] {
    const catalogs: GiftOffer[][] = [];
    let seed = 7;
    const next = () => {
        seed = (seed * 48271) % 2147483647;
        return seed;
    };
    for (let c = 0; c < 40; c++) {
        const size = next() % 12;
        const offers: GiftOffer[] = [];
        for (let i = 0; i < size; i++) {
            const remainsRoll = next() % 4;
            offers.push({
                id: `c${c}-g${i}`,
                price: (next() % 20) * 50,
                limited: next() % 3 !== 0,
                soldOut: next() % 4 === 0,
                ...(remainsRoll === 0 ? {} : { availabilityRemains: remainsRoll - 1 }),
            });
        }
        catalogs.push(offers);
    }
    return catalogs;
}

describe("isEligible", () => {
    it("accepts a limited offer priced exactly at the ceiling", () => {
        expect(isEligible(offer("g", 500), 500)).toBe(true);
    });

    it("accepts a limited offer below the ceiling", () => {
        expect(isEligible(offer("g", 499), 500)).toBe(true);
    });

    it("rejects an offer one star above the ceiling", () => {
        expect(isEligible(offer("g", 501), 500)).toBe(false);
    });

    it("rejects unlimited offers", () => {
        expect(isEligible(offer("g", 10, { limited: false }), 500)).toBe(false);
    });

    it("rejects sold out offers", () => {
        expect(isEligible(offer("g", 10, { soldOut: true }), 500)).toBe(false);
    });

    it("rejects offers with nothing left", () => {
        expect(isEligible(offer("g", 10, { availabilityRemains: 0 }), 500)).toBe(false);
    });

    it("treats a missing remaining count as unconstrained", () => {
        expect(isEligible(offer("g", 10), 500)).toBe(true);
        expect(isEligible(offer("g", 10, { availabilityRemains: 1 }), 500)).toBe(true);
    });
});

describe("selectCandidates", () => {
    it("orders candidates cheapest first", () => {
        const result = selectCandidates([offer("a", 300), offer("b", 100), offer("c", 200)], 500);
        expect(result.map(o => o.id)).toEqual(["b", "c", "a"]);
    });

    it("keeps catalog order for equal prices", () => {
        const result = selectCandidates(
            [offer("x", 200), offer("a", 100), offer("b", 100), offer("c", 100)],
            500,
        );
        expect(result.map(o => o.id)).toEqual(["a", "b", "c", "x"]);
    });

    it("returns an empty list when nothing qualifies", () => {
        expect(selectCandidates([offer("a", 600, { soldOut: true })], 500)).toEqual([]);
        expect(selectCandidates([], 500)).toEqual([]);
    });

    it("does not mutate the catalog", () => {
        const catalog = [offer("a", 300), offer("b", 100)];
        selectCandidates(catalog, 500);
        expect(catalog.map(o => o.id)).toEqual(["a", "b"]);
    });

    it("only returns eligible offers in non-decreasing price order", () => {
        for (const catalog of makeCatalogs()) {
            for (const ceiling of [0, 250, 500, 1000]) {
                const result = selectCandidates(catalog, ceiling);
                expect(result.every(o => isEligible(o, ceiling))).toBe(true);
                expect(result).toHaveLength(catalog.filter(o => isEligible(o, ceiling)).length);
                const prices = result.map(o => o.price);
                expect(prices).toEqual([...prices].sort((a, b) => a - b));
            }
        }
    });
});
