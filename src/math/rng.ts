/*
 *  rng.ts — Seeded random streams (Bob Jenkins' small PRNG)
 *  hearthlight
 *
 *  Every stream is an explicit object built from a 64-bit seed. Nothing
 *  here is global: callers derive a sub-seed for each context (level,
 *  door, chests, battle) and create a stream from it, so the same base
 *  seed always reproduces the same world.
 *
 *  The generator uses 32-bit unsigned arithmetic with overflow semantics;
 *  `>>> 0` keeps every lane unsigned.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

const U64_MASK = 0xFFFFFFFFFFFFFFFFn;
const RAND_MAX_COMBO = 0xFFFFFFFF;

// ===== Internal state =====

interface RanCtx {
    a: number;
    b: number;
    c: number;
    d: number;
}

function rot(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function ranval(ctx: RanCtx): number {
    const e = (ctx.a - rot(ctx.b, 27)) >>> 0;
    ctx.a = (ctx.b ^ rot(ctx.c, 17)) >>> 0;
    ctx.b = (ctx.c + ctx.d) >>> 0;
    ctx.c = (ctx.d + e) >>> 0;
    ctx.d = (e + ctx.a) >>> 0;
    return ctx.d;
}

function raninit(seed: bigint): RanCtx {
    const lo = Number(seed & 0xFFFFFFFFn) >>> 0;
    const hi = Number((seed >> 32n) & 0xFFFFFFFFn) >>> 0;

    const ctx: RanCtx = {
        a: 0xf1ea5eed,
        b: lo,
        c: (lo ^ hi) >>> 0,
        d: lo,
    };

    for (let i = 0; i < 20; i++) {
        ranval(ctx);
    }
    return ctx;
}

// ===== Public API =====

export interface RandomStream {
    /** The seed this stream was created from. */
    readonly seed: bigint;
    /** Raw 32-bit output. */
    next(): number;
    /** Integer in [lowerBound, upperBound], inclusive. */
    range(lowerBound: number, upperBound: number): number;
    /** True with a `percent` out of 100 chance. */
    percent(percent: number): boolean;
    /** Uniform element of a non-empty list. */
    pick<T>(list: readonly T[]): T;
}

/**
 * Create a stream from a 64-bit seed. Seeds outside [0, 2^64) are wrapped.
 */
export function createRandomStream(seed: bigint): RandomStream {
    const normalized = seed & U64_MASK;
    const ctx = raninit(normalized);

    /** Unbiased value in [0, n-1] by rejection sampling. */
    const below = (n: number): number => {
        const div = Math.floor(RAND_MAX_COMBO / n);
        let r: number;
        do {
            r = Math.floor(ranval(ctx) / div);
        } while (r >= n);
        return r;
    };

    const range = (lowerBound: number, upperBound: number): number => {
        if (upperBound <= lowerBound) {
            return lowerBound;
        }
        return lowerBound + below(upperBound - lowerBound + 1);
    };

    return {
        seed: normalized,
        next: () => ranval(ctx),
        range,
        percent(percent: number): boolean {
            return range(0, 99) < clamp(percent, 0, 100);
        },
        pick<T>(list: readonly T[]): T {
            if (list.length === 0) {
                throw new RangeError("pick: cannot choose from an empty list");
            }
            return list[range(0, list.length - 1)];
        },
    };
}

/** `(base + offset) mod 2^64`. */
export function deriveSeed(base: bigint, offset: bigint): bigint {
    return (base + offset) & U64_MASK;
}

/** `base XOR salt`, kept within 64 bits. */
export function mixSeed(base: bigint, salt: bigint): bigint {
    return (base ^ salt) & U64_MASK;
}

// ===== Utility functions =====

/**
 * Clamp a value between min and max.
 */
export function clamp(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}
