/*
 *  config.ts — World creation options
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { z } from "zod";
import {
    DEFAULT_MAP_WIDTH, DEFAULT_MAP_HEIGHT,
    MIN_MAP_WIDTH, MIN_MAP_HEIGHT, MAX_MAP_WIDTH, MAX_MAP_HEIGHT,
} from "../types/constants.js";
import { ConfigError } from "./errors.js";

const U64_MAX = 0xFFFFFFFFFFFFFFFFn;

/**
 * The minimum sizes guarantee that the first room attempt always fits,
 * which in turn guarantees enough floor for the door, chests and NPCs.
 */
export const WorldOptionsSchema = z.object({
    seed: z.coerce.bigint().min(0n).max(U64_MAX),
    width: z.coerce.number().int().min(MIN_MAP_WIDTH).max(MAX_MAP_WIDTH).default(DEFAULT_MAP_WIDTH),
    height: z.coerce.number().int().min(MIN_MAP_HEIGHT).max(MAX_MAP_HEIGHT).default(DEFAULT_MAP_HEIGHT),
});

export type WorldOptions = z.infer<typeof WorldOptionsSchema>;
/** What hosts may pass in; strings come straight from the environment. */
export interface WorldOptionsInput {
    seed: bigint | number | string;
    width?: number | string;
    height?: number | string;
}

export function parseWorldOptions(input: unknown): WorldOptions {
    const result = WorldOptionsSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
        }));
        throw new ConfigError(
            `Invalid world options: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
            { issues },
        );
    }
    return result.data;
}

/**
 * Read options from the environment. A missing seed is taken from
 * `fallbackSeed`, which the host usually draws from its own entropy.
 */
export function buildWorldOptions(
    env: NodeJS.ProcessEnv = process.env,
    fallbackSeed: bigint = BigInt(Date.now()),
): WorldOptions {
    return parseWorldOptions({
        seed: env.HEARTHLIGHT_SEED || fallbackSeed,
        width: env.HEARTHLIGHT_WIDTH || undefined,
        height: env.HEARTHLIGHT_HEIGHT || undefined,
    });
}
