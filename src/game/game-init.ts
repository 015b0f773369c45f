/*
 *  game-init.ts — World creation: levels, NPC roster, player, welcome log
 *  hearthlight
 *
 *  Everything random here is drawn from streams derived from the world
 *  seed, so the same options always produce the same world.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Level, Npc, Pos } from "../types/types.js";
import { PhaseKind, Tile } from "../types/enums.js";
import { BATTLE_SEED_SALT, NPC_SEED_SALT, NPC_SPACING } from "../types/constants.js";
import type { Clock, Logger } from "../types/platform.js";
import { type RandomStream, createRandomStream, mixSeed } from "../math/rng.js";
import { countTiles } from "../grid/grid.js";
import { buildLevel, chooseFreeTile, levelSeed } from "../architect/level.js";
import { npcCatalog } from "../globals/npc-catalog.js";
import { welcomeMessages } from "../globals/dialogue-catalog.js";
import { createMessageLog } from "../io/io-messages.js";
import { createPlayer } from "../items/item-usage.js";
import { type World, logMessage } from "../state/game-state.js";
import { systemClock } from "../platform/clock.js";
import { consoleLogger } from "../platform/logger.js";
import { type WorldOptionsInput, parseWorldOptions } from "../utils/config.js";
import { GenerationError } from "../utils/errors.js";

export interface WorldDeps {
    clock?: Clock;
    logger?: Logger;
}

// =============================================================================
// NPC placement
// =============================================================================

/**
 * Place each roster entry on its level. NPCs avoid the spawn, door,
 * chests and each other, and try to keep NPC_SPACING from the spawn and
 * from NPCs already placed before that constraint is relaxed.
 */
export function placeNpcs(levels: readonly Level[], rng: RandomStream): Npc[] {
    const npcs: Npc[] = [];
    for (const definition of npcCatalog) {
        const level = levels[definition.level];
        const placed = npcs.filter((n) => n.level === definition.level).map((n) => n.pos);
        const excluded: Pos[] = [level.spawn, level.door, ...level.chests.map((c) => c.pos), ...placed];
        const pos = chooseFreeTile(level.map, rng, excluded, {
            from: [level.spawn, ...placed],
            distance: NPC_SPACING,
        });
        if (pos === null) {
            throw new GenerationError("No free tile left for an NPC", {
                npc: definition.name,
                level: definition.level,
            });
        }
        npcs.push({
            id: definition.id,
            name: definition.name,
            level: definition.level,
            pos,
            symbol: definition.symbol,
        });
    }
    return npcs;
}

// =============================================================================
// Welcome
// =============================================================================

export function welcome(world: World): void {
    logMessage(world, `Seed: ${world.seed}`);
    for (const line of welcomeMessages) {
        logMessage(world, line);
    }
}

// =============================================================================
// createWorld
// =============================================================================

/**
 * Validate `options` and build a fresh world on the Title screen. Throws
 * ConfigError for bad options and GenerationError if a level cannot hold
 * its contents.
 */
export function createWorld(options: WorldOptionsInput, deps: WorldDeps = {}): World {
    const { seed, width, height } = parseWorldOptions(options);
    const clock = deps.clock ?? systemClock;
    const logger = deps.logger ?? consoleLogger();

    const levels: [Level, Level] = [
        buildLevel(seed, 0, width, height),
        buildLevel(seed, 1, width, height),
    ];
    for (const level of levels) {
        logger.debug("level generated", {
            depth: level.depth,
            seed: levelSeed(seed, level.depth).toString(),
            floor: countTiles(level.map, Tile.Floor),
            chests: level.chests.length,
            spawn: level.spawn,
            door: level.door,
        });
    }

    const world: World = {
        seed,
        levels,
        current: 0,
        player: createPlayer(levels[0].spawn),
        npcs: placeNpcs(levels, createRandomStream(mixSeed(seed, NPC_SEED_SALT))),
        flags: new Set(),
        log: createMessageLog(),
        phase: { kind: PhaseKind.Title },
        inventoryOpen: false,
        statsOpen: false,
        rng: createRandomStream(mixSeed(seed, BATTLE_SEED_SALT)),
        clock,
        logger,
    };
    welcome(world);
    logger.info("world created", { seed: seed.toString(), width, height });
    return world;
}
