/*
 *  map-queries.ts — What stands on, or next to, a map cell
 *  hearthlight
 *
 *  Neighbourhood scans walk nbDirs in its fixed order, so "the adjacent
 *  NPC" is always the same one for a given layout.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Npc, Pos } from "../types/types.js";
import { Tile } from "../types/enums.js";
import { getTile, nbDirs, posEquals } from "../grid/grid.js";
import { type World, currentMap, npcsOnCurrentLevel } from "../state/game-state.js";

/** The NPC standing at `pos` on the current level. */
export function npcAt(world: World, pos: Pos): Npc | null {
    return npcsOnCurrentLevel(world).find((n) => posEquals(n.pos, pos)) ?? null;
}

/** First NPC in the player's 8-neighbourhood. */
export function adjacentNpc(world: World): Npc | null {
    const { x, y } = world.player.pos;
    for (const [dx, dy] of nbDirs) {
        const npc = npcAt(world, { x: x + dx, y: y + dy });
        if (npc) {
            return npc;
        }
    }
    return null;
}

/** The door cell if it touches the player's 8-neighbourhood. */
export function adjacentDoor(world: World): Pos | null {
    const map = currentMap(world);
    const { x, y } = world.player.pos;
    for (const [dx, dy] of nbDirs) {
        if (getTile(map, x + dx, y + dy) === Tile.Door) {
            return { x: x + dx, y: y + dy };
        }
    }
    return null;
}
