/*
 *  logger.ts — Console-backed and no-op diagnostic loggers
 *  hearthlight
 *
 *  Diagnostics only. Player-facing text goes to the world's message log.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Logger } from "../types/platform.js";

const PREFIX = "[hearthlight]";

/**
 * Writes to stderr through the console; a terminal front end owns stdout
 * while the game runs. Debug lines are dropped unless `verbose` is set.
 */
export function consoleLogger(verbose = false): Logger {
    return {
        debug(message, details) {
            if (verbose) {
                console.error(PREFIX, "debug", message, details ?? "");
            }
        },
        info(message, details) {
            console.error(PREFIX, "info", message, details ?? "");
        },
        warn(message, details) {
            console.error(PREFIX, "warn", message, details ?? "");
        },
    };
}

/** A logger that discards everything. Useful for tests and headless runs. */
export const nullLogger: Logger = {
    debug(): void {
        // No-op
    },
    info(): void {
        // No-op
    },
    warn(): void {
        // No-op
    },
};
