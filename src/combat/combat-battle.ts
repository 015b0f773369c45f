/*
 *  combat-battle.ts — Turn-based battle against a single enemy
 *  hearthlight
 *
 *  A battle lives inside the Battle phase. Each resolved turn clears the
 *  one-turn penalty and checks for a knockout; the session disappears
 *  with the phase, on victory, defeat or a successful flee.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { BattleSession, Chest, Level, Pos } from "../types/types.js";
import {
    BattleOption, BattleOutcome, InvTab, NpcId, PhaseKind, RewardPlacement, Tile,
} from "../types/enums.js";
import { FLEE_PERCENT, NEARBY_REWARD_RADIUS } from "../types/constants.js";
import { chebyshevDistance, getTile, nbDirs, posEquals, setTile } from "../grid/grid.js";
import { chooseFreeTile } from "../architect/level.js";
import { dialogueCatalog, type BattleScript } from "../globals/dialogue-catalog.js";
import { makeConsumable, makeEquipment } from "../globals/item-catalog.js";
import { npcDefinition } from "../globals/npc-catalog.js";
import { setTab } from "../items/item-inventory.js";
import {
    describeConsumeResult, effectiveAttack, effectiveDefense, effectiveSpeed, useSelectedConsumable,
} from "../items/item-usage.js";
import { type World, logMessage, setFlag } from "../state/game-state.js";
import { openPostBattleDialogue } from "../dialogue/dialogue.js";
import { attackDeflected, computeDamage, playerActsFirst } from "./combat-math.js";

// =============================================================================
// Session
// =============================================================================

export function activeBattle(world: World): BattleSession | null {
    return world.phase.kind === PhaseKind.Battle ? world.phase.session : null;
}

/**
 * Enter the Battle phase against `npcId`. Characters with no combat stats
 * cannot be fought; returns false and leaves the world as it was.
 */
export function startBattle(world: World, npcId: NpcId, playerInitiated: boolean): boolean {
    const definition = npcDefinition(npcId);
    if (definition.enemy === null) {
        return false;
    }
    const { hp, attack, defense, speed } = definition.enemy;
    world.inventoryOpen = false;
    world.statsOpen = false;
    world.phase = {
        kind: PhaseKind.Battle,
        session: {
            npc: npcId,
            enemyName: definition.name,
            enemyHp: hp,
            enemyMaxHp: hp,
            enemyAttack: attack,
            enemyDefense: defense,
            enemySpeed: speed,
            penalty: false,
            playerInitiated,
            turn: 0,
        },
    };
    logMessage(world, playerInitiated
        ? `You face ${definition.name}!`
        : `${definition.name} attacks!`);
    world.logger.debug("battle started", { enemy: definition.name, playerInitiated });
    return true;
}

// =============================================================================
// Strikes
// =============================================================================

function playerStrikes(world: World, session: BattleSession): void {
    if (attackDeflected(world.rng, session.enemyDefense)) {
        logMessage(world, `${session.enemyName} deflects your blow.`);
        return;
    }
    const damage = computeDamage(effectiveAttack(world.player, world.clock.now()));
    session.enemyHp = Math.max(0, session.enemyHp - damage);
    logMessage(world, `You hit ${session.enemyName} for ${damage}.`);
}

function enemyStrikes(world: World, session: BattleSession): void {
    const player = world.player;
    if (attackDeflected(world.rng, effectiveDefense(player, world.clock.now()))) {
        logMessage(world, `You deflect ${session.enemyName}'s attack.`);
        return;
    }
    const damage = computeDamage(session.enemyAttack);
    player.hp = Math.max(0, player.hp - damage);
    logMessage(world, `${session.enemyName} hits you for ${damage}.`);
}

/** Both sides act in initiative order; a knocked-out side does not act. */
function fightRound(world: World, session: BattleSession): void {
    const playerFirst = playerActsFirst(
        effectiveSpeed(world.player, world.clock.now()), session.enemySpeed, session.penalty);
    if (playerFirst) {
        playerStrikes(world, session);
        if (session.enemyHp > 0) {
            enemyStrikes(world, session);
        }
    } else {
        enemyStrikes(world, session);
        if (world.player.hp > 0) {
            playerStrikes(world, session);
        }
    }
}

// =============================================================================
// Rewards
// =============================================================================

function tileIsFree(world: World, level: Level, pos: Pos): boolean {
    if (getTile(level.map, pos.x, pos.y) !== Tile.Floor) {
        return false;
    }
    const onLevel = world.levels[world.current] === level;
    if (onLevel && posEquals(world.player.pos, pos)) {
        return false;
    }
    return !world.npcs.some((n) => world.levels[n.level] === level && posEquals(n.pos, pos));
}

function occupiedPositions(world: World, level: Level): Pos[] {
    const taken = world.npcs.filter((n) => world.levels[n.level] === level).map((n) => n.pos);
    taken.push(world.player.pos, level.door);
    return taken;
}

/**
 * Where a reward chest goes. Adjacent: first free neighbour of `origin`
 * in scan order. Nearby: a random free floor tile within a small radius.
 * Either falls back to `origin` itself, then to any free floor tile.
 */
function rewardPosition(world: World, level: Level, origin: Pos, placement: RewardPlacement): Pos | null {
    if (placement === RewardPlacement.Adjacent) {
        for (const [dx, dy] of nbDirs) {
            const pos = { x: origin.x + dx, y: origin.y + dy };
            if (tileIsFree(world, level, pos)) {
                return pos;
            }
        }
    } else {
        const candidates: Pos[] = [];
        for (let y = origin.y - NEARBY_REWARD_RADIUS; y <= origin.y + NEARBY_REWARD_RADIUS; y++) {
            for (let x = origin.x - NEARBY_REWARD_RADIUS; x <= origin.x + NEARBY_REWARD_RADIUS; x++) {
                const pos = { x, y };
                if (!posEquals(pos, origin) && chebyshevDistance(pos, origin) <= NEARBY_REWARD_RADIUS
                    && tileIsFree(world, level, pos)) {
                    candidates.push(pos);
                }
            }
        }
        if (candidates.length > 0) {
            return world.rng.pick(candidates);
        }
    }
    if (tileIsFree(world, level, origin)) {
        return { ...origin };
    }
    return chooseFreeTile(level.map, world.rng, occupiedPositions(world, level));
}

function spawnRewardChests(world: World, level: Level, origin: Pos, script: BattleScript): void {
    for (const reward of script.rewards) {
        const pos = rewardPosition(world, level, origin, script.placement);
        if (pos === null) {
            world.logger.warn("no room for a reward chest", { origin });
            continue;
        }
        const chest: Chest = {
            pos,
            consumable: reward.consumable ? makeConsumable(reward.consumable) : null,
            equipment: reward.equipment ? makeEquipment(reward.equipment) : null,
            opened: false,
        };
        setTile(level.map, pos.x, pos.y, Tile.Chest);
        level.chests.push(chest);
    }
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * One-time victory effects: the defeat flag, removal from the world and
 * reward chests, then the post-battle lines.
 */
function winBattle(world: World, session: BattleSession): void {
    const definition = npcDefinition(session.npc);
    logMessage(world, `${session.enemyName} is defeated!`);
    world.phase = { kind: PhaseKind.Playing };

    if (!setFlag(world, definition.flag)) {
        return;
    }
    const script = dialogueCatalog[session.npc].battle;
    const npc = world.npcs.find((n) => n.id === session.npc);
    if (script !== null && npc !== undefined) {
        if (script.removeOnDefeat) {
            world.npcs = world.npcs.filter((n) => n !== npc);
        }
        spawnRewardChests(world, world.levels[npc.level], npc.pos, script);
    }
    world.logger.info("enemy defeated", { enemy: session.enemyName, turns: session.turn });
    openPostBattleDialogue(world, session.npc);
}

function loseBattle(world: World, session: BattleSession): void {
    logMessage(world, `You were defeated by ${session.enemyName}.`);
    world.inventoryOpen = false;
    world.phase = { kind: PhaseKind.Ending, outcome: "defeat" };
    world.logger.info("player defeated", { enemy: session.enemyName, turns: session.turn });
}

/** Close out a resolved turn and end the battle on a knockout. */
function finishTurn(world: World, session: BattleSession): BattleOutcome {
    session.turn++;
    session.penalty = false;
    if (world.player.hp <= 0) {
        loseBattle(world, session);
        return BattleOutcome.Defeat;
    }
    if (session.enemyHp <= 0) {
        winBattle(world, session);
        return BattleOutcome.Victory;
    }
    return BattleOutcome.Continue;
}

function tryToFlee(world: World, session: BattleSession): BattleOutcome {
    if (session.playerInitiated) {
        logMessage(world, "There is no running from this fight!");
        enemyStrikes(world, session);
        return finishTurn(world, session);
    }
    if (world.rng.percent(FLEE_PERCENT)) {
        logMessage(world, "You got away.");
        world.inventoryOpen = false;
        world.phase = { kind: PhaseKind.Playing };
        return BattleOutcome.Fled;
    }
    logMessage(world, "You couldn't get away!");
    enemyStrikes(world, session);
    return finishTurn(world, session);
}

/**
 * Resolve one battle option. `penalty` forces enemy-first initiative for
 * this turn only. Opening the inventory does not spend the turn.
 */
export function resolveBattleOption(world: World, option: BattleOption, penalty: boolean): BattleOutcome {
    const session = activeBattle(world);
    if (session === null) {
        return BattleOutcome.Continue;
    }
    session.penalty = penalty;

    switch (option) {
        case BattleOption.Fight:
            fightRound(world, session);
            return finishTurn(world, session);
        case BattleOption.Inventory:
            openBattleInventory(world);
            return BattleOutcome.Continue;
        case BattleOption.Run:
            return tryToFlee(world, session);
    }
}

/** The inventory overlay in battle only ever shows consumables. */
export function openBattleInventory(world: World): void {
    world.inventoryOpen = true;
    setTab(world.player.inventory, InvTab.Consumables);
}

/**
 * Use the selected consumable mid-battle. It costs the turn: the enemy
 * strikes once afterwards. With nothing to use, no turn passes.
 */
export function useConsumableInBattle(world: World): BattleOutcome {
    const session = activeBattle(world);
    if (session === null) {
        return BattleOutcome.Continue;
    }
    const result = useSelectedConsumable(world.player, world.clock.now());
    if (result === null) {
        logMessage(world, "You have nothing to use.");
        return BattleOutcome.Continue;
    }
    logMessage(world, describeConsumeResult(result));
    world.inventoryOpen = false;
    enemyStrikes(world, session);
    return finishTurn(world, session);
}
