/*
 *  game-level.ts — Moving the player between Room 1 and Room 2
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Level, LevelIndex, Pos } from "../types/types.js";
import { Tile } from "../types/enums.js";
import { getTile, nbDirs, posEquals } from "../grid/grid.js";
import { type World, logMessage } from "../state/game-state.js";

/**
 * Where the player lands on `level`: the first Floor neighbour of its door
 * in scan order that no NPC stands on, or the door tile itself.
 */
export function arrivalPosition(world: World, index: LevelIndex, level: Level): Pos {
    const { door } = level;
    for (const [dx, dy] of nbDirs) {
        const pos = { x: door.x + dx, y: door.y + dy };
        if (getTile(level.map, pos.x, pos.y) !== Tile.Floor) {
            continue;
        }
        if (world.npcs.some((n) => n.level === index && posEquals(n.pos, pos))) {
            continue;
        }
        return pos;
    }
    return { ...door };
}

/** Swap to the other level and drop the player beside its door. */
export function enterOtherLevel(world: World): void {
    const next: LevelIndex = world.current === 0 ? 1 : 0;
    const level = world.levels[next];
    world.current = next;
    world.player.pos = arrivalPosition(world, next, level);
    logMessage(world, `You step through the door into Room ${next + 1}.`);
    world.logger.debug("level entered", { level: next, pos: world.player.pos });
}
