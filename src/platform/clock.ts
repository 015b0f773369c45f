/*
 *  clock.ts — Wall clock and a hand-driven clock for headless runs
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Clock } from "../types/platform.js";

export const systemClock: Clock = {
    now(): number {
        return Date.now();
    },
};

/** A clock that only moves when told to. */
export interface ManualClock extends Clock {
    advance(ms: number): void;
    set(ms: number): void;
}

export function createManualClock(start = 0): ManualClock {
    let time = start;
    return {
        now: () => time,
        advance(ms: number): void {
            time += ms;
        },
        set(ms: number): void {
            time = ms;
        },
    };
}
