/*
 *  level.ts — Level assembly: spawn, door and chest placement
 *  hearthlight
 *
 *  Turns a carved room layout into a playable level. Every random choice
 *  draws from a stream derived from the level seed, so a level is fully
 *  determined by (seed, depth, width, height).
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Chest, Level, Pos, TileMap } from "../types/types.js";
import { Tile } from "../types/enums.js";
import {
    LEVEL_SEED_STRIDE, DOOR_SEED_SALT, CHEST_SEED_SALT, LOOT_SEED_SALT,
    MAX_CHESTS_PER_LEVEL, PLACEMENT_ATTEMPTS,
} from "../types/constants.js";
import { createRandomStream, deriveSeed, mixSeed, type RandomStream } from "../math/rng.js";
import {
    findFirstFloor, floorTiles, getTile, setTile, posEquals, chebyshevDistance,
} from "../grid/grid.js";
import { rollChestContents } from "../globals/item-catalog.js";
import { GenerationError } from "../utils/errors.js";
import { generateRoomsAndCorridors } from "./rooms.js";

// =============================================================================
// Free tile selection
// =============================================================================

function isExcluded(pos: Pos, excluded: readonly Pos[]): boolean {
    return excluded.some((p) => posEquals(p, pos));
}

function respectsSpacing(pos: Pos, others: readonly Pos[], spacing: number): boolean {
    return others.every((p) => chebyshevDistance(p, pos) >= spacing);
}

/**
 * Pick a Floor tile not in `excluded`.
 *
 * Samples random coordinates up to PLACEMENT_ATTEMPTS times. With a
 * spacing constraint, a first round also demands `spacing.distance` from
 * every `spacing.from` position; if that fails the constraint is dropped
 * for a second round. The last resort is a uniform pick among all
 * eligible floor tiles. Returns null only when no eligible tile exists.
 */
export function chooseFreeTile(
    map: TileMap,
    rng: RandomStream,
    excluded: readonly Pos[],
    spacing?: { from: readonly Pos[]; distance: number },
): Pos | null {
    const sample = (accept: (pos: Pos) => boolean): Pos | null => {
        for (let i = 0; i < PLACEMENT_ATTEMPTS; i++) {
            const pos = {
                x: rng.range(0, map.width - 1),
                y: rng.range(0, map.height - 1),
            };
            if (getTile(map, pos.x, pos.y) === Tile.Floor && !isExcluded(pos, excluded) && accept(pos)) {
                return pos;
            }
        }
        return null;
    };

    if (spacing !== undefined) {
        const spaced = sample((pos) => respectsSpacing(pos, spacing.from, spacing.distance));
        if (spaced !== null) {
            return spaced;
        }
    }

    const loose = sample(() => true);
    if (loose !== null) {
        return loose;
    }

    const candidates = floorTiles(map, excluded);
    return candidates.length > 0 ? rng.pick(candidates) : null;
}

// =============================================================================
// Door
// =============================================================================

/**
 * Convert one Floor tile, chosen uniformly among all floor tiles except
 * `spawn`, into the level's Door.
 */
export function placeDoor(map: TileMap, rng: RandomStream, spawn: Pos): Pos {
    const candidates = floorTiles(map, [spawn]);
    if (candidates.length === 0) {
        throw new GenerationError("No floor tile left for the door", { spawn });
    }
    const door = rng.pick(candidates);
    setTile(map, door.x, door.y, Tile.Door);
    return door;
}

// =============================================================================
// Chests
// =============================================================================

/**
 * Scatter up to MAX_CHESTS_PER_LEVEL chests on free floor. Stops early if
 * the map runs out of eligible tiles.
 */
export function scatterChests(
    map: TileMap,
    depth: number,
    placementRng: RandomStream,
    lootRng: RandomStream,
    excluded: readonly Pos[],
): Chest[] {
    const chests: Chest[] = [];
    const taken: Pos[] = [...excluded];

    for (let i = 0; i < MAX_CHESTS_PER_LEVEL; i++) {
        const pos = chooseFreeTile(map, placementRng, taken);
        if (pos === null) {
            break;
        }
        taken.push(pos);
        setTile(map, pos.x, pos.y, Tile.Chest);
        const contents = rollChestContents(depth, i, lootRng);
        chests.push({ pos, ...contents, opened: false });
    }
    return chests;
}

// =============================================================================
// Level
// =============================================================================

export function levelSeed(baseSeed: bigint, depth: number): bigint {
    return deriveSeed(baseSeed, BigInt(depth) * LEVEL_SEED_STRIDE);
}

/**
 * Build level `depth` of a world. Spawn is the first Floor tile in scan
 * order; the door and chests never land on it.
 */
export function buildLevel(baseSeed: bigint, depth: number, width: number, height: number): Level {
    const seed = levelSeed(baseSeed, depth);
    const { map } = generateRoomsAndCorridors(width, height, createRandomStream(seed));

    const spawn = findFirstFloor(map);
    if (spawn === null) {
        throw new GenerationError("Generated level has no floor", { depth, width, height });
    }

    const door = placeDoor(map, createRandomStream(mixSeed(seed, DOOR_SEED_SALT)), spawn);
    const chests = scatterChests(
        map,
        depth,
        createRandomStream(mixSeed(seed, CHEST_SEED_SALT)),
        createRandomStream(mixSeed(seed, LOOT_SEED_SALT)),
        [spawn, door],
    );

    return { depth, map, spawn, door, chests };
}
