/*
 *  player-movement.ts — Free-roam steps
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { inBounds, isWalkable } from "../grid/grid.js";
import { type World, currentMap } from "../state/game-state.js";
import { npcAt } from "./map-queries.js";

/**
 * Step the player by (dx, dy). Out-of-bounds cells, walls, doors and
 * cells holding an NPC all block. Returns whether the player moved.
 */
export function tryMovePlayer(world: World, dx: number, dy: number): boolean {
    if (dx === 0 && dy === 0) {
        return false;
    }
    const map = currentMap(world);
    const target = { x: world.player.pos.x + dx, y: world.player.pos.y + dy };
    if (!inBounds(map, target.x, target.y) || !isWalkable(map, target.x, target.y)) {
        return false;
    }
    if (npcAt(world, target)) {
        return false;
    }
    world.player.pos = target;
    return true;
}
