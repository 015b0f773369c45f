/*
 *  game-state.ts — The World container
 *  hearthlight
 *
 *  One World object owns everything that changes while the game runs.
 *  Every operation takes it explicitly; there is no module-level state.
 *  Renderers read it through `snapshotWorld` and never mutate it.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { GamePhase, Level, LevelIndex, Npc, Player, TileMap } from "../types/types.js";
import type { QuestFlag } from "../types/enums.js";
import type { Clock, Logger } from "../types/platform.js";
import type { RandomStream } from "../math/rng.js";
import { type MessageLog, pushMessage } from "../io/io-messages.js";

export interface World {
    seed: bigint;
    /** Room 1 and Room 2, generated once at creation. */
    levels: [Level, Level];
    current: LevelIndex;
    player: Player;
    /** NPCs still in the world, across both levels. */
    npcs: Npc[];
    flags: Set<QuestFlag>;
    log: MessageLog;
    phase: GamePhase;

    inventoryOpen: boolean;
    statsOpen: boolean;

    /** Runtime randomness (battle rolls, reward placement). */
    rng: RandomStream;
    clock: Clock;
    logger: Logger;
}

// =============================================================================
// Accessors
// =============================================================================

export function currentLevel(world: World): Level {
    return world.levels[world.current];
}

export function currentMap(world: World): TileMap {
    return currentLevel(world).map;
}

export function npcsOnCurrentLevel(world: World): Npc[] {
    return world.npcs.filter((n) => n.level === world.current);
}

export function logMessage(world: World, message: string): void {
    pushMessage(world.log, message);
}

// =============================================================================
// Quest flags
// =============================================================================

export function hasFlag(world: World, flag: QuestFlag): boolean {
    return world.flags.has(flag);
}

/** Set a one-way flag. Returns true only the first time. */
export function setFlag(world: World, flag: QuestFlag): boolean {
    if (world.flags.has(flag)) {
        return false;
    }
    world.flags.add(flag);
    return true;
}
