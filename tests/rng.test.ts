/*
 *  rng.test.ts — Tests for seeded random streams
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import { createRandomStream, deriveSeed, mixSeed, clamp } from "../src/math/rng.js";

function draw(seed: bigint, count: number): number[] {
    const rng = createRandomStream(seed);
    return Array.from({ length: count }, () => rng.next());
}

describe("createRandomStream", () => {
    it("repeats the same sequence for the same seed", () => {
        expect(draw(42n, 20)).toEqual(draw(42n, 20));
    });

    it("gives different sequences for different seeds", () => {
        expect(draw(42n, 20)).not.toEqual(draw(43n, 20));
    });

    it("keeps independent streams independent", () => {
        const a = createRandomStream(9n);
        const b = createRandomStream(9n);
        a.next();
        a.next();
        const fromB = [b.next(), b.next(), b.next()];
        const fresh = draw(9n, 3);
        expect(fromB).toEqual(fresh);
    });

    it("wraps seeds into 64 bits", () => {
        expect(createRandomStream(-1n).seed).toBe(2n ** 64n - 1n);
        expect(createRandomStream(2n ** 64n + 5n).seed).toBe(5n);
    });
});

describe("range", () => {
    it("stays within inclusive bounds and reaches both ends", () => {
        const rng = createRandomStream(1n);
        const seen = new Set<number>();
        for (let i = 0; i < 500; i++) {
            const v = rng.range(3, 7);
            expect(v).toBeGreaterThanOrEqual(3);
            expect(v).toBeLessThanOrEqual(7);
            seen.add(v);
        }
        expect([...seen].sort()).toEqual([3, 4, 5, 6, 7]);
    });

    it("returns the lower bound for an empty or single range", () => {
        const rng = createRandomStream(1n);
        expect(rng.range(5, 5)).toBe(5);
        expect(rng.range(5, 2)).toBe(5);
    });
});

describe("percent", () => {
    it("never fires at 0 and always fires at 100", () => {
        const rng = createRandomStream(3n);
        for (let i = 0; i < 100; i++) {
            expect(rng.percent(0)).toBe(false);
            expect(rng.percent(100)).toBe(true);
        }
    });
});

describe("pick", () => {
    it("returns an element of the list", () => {
        const rng = createRandomStream(4n);
        const list = ["a", "b", "c"];
        for (let i = 0; i < 50; i++) {
            expect(list).toContain(rng.pick(list));
        }
    });

    it("throws on an empty list", () => {
        expect(() => createRandomStream(4n).pick([])).toThrow(RangeError);
    });
});

describe("seed derivation", () => {
    it("adds offsets modulo 2^64", () => {
        expect(deriveSeed(10n, 9973n)).toBe(9983n);
        expect(deriveSeed(2n ** 64n - 1n, 2n)).toBe(1n);
    });

    it("mixes salts with xor", () => {
        expect(mixSeed(0xffn, 0x0fn)).toBe(0xf0n);
        expect(mixSeed(mixSeed(123n, 0xd00dn), 0xd00dn)).toBe(123n);
    });
});

describe("clamp", () => {
    it("pins values to the range", () => {
        expect(clamp(-3, 0, 10)).toBe(0);
        expect(clamp(13, 0, 10)).toBe(10);
        expect(clamp(4, 0, 10)).toBe(4);
    });
});
