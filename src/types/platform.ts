/*
 *  platform.ts — Host services injected into the simulation
 *  hearthlight
 *
 *  The world never reads the wall clock or writes diagnostics directly;
 *  any host (terminal front end, test harness, headless runner) supplies
 *  these.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

export interface Clock {
    /** Current time in milliseconds. Only differences matter. */
    now(): number;
}

export interface Logger {
    debug(message: string, details?: Record<string, unknown>): void;
    info(message: string, details?: Record<string, unknown>): void;
    warn(message: string, details?: Record<string, unknown>): void;
}
