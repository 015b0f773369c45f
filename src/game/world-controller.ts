/*
 *  world-controller.ts — One action in, one world update out
 *  hearthlight
 *
 *  applyAction is the only entry point that mutates a World after
 *  creation. Actions that make no sense in the current phase are silent
 *  no-ops; Quit is accepted everywhere and is the only action that asks
 *  the caller to stop.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Action } from "../types/actions.js";
import { ActionKind, DialogueCloseEffect, InvTab, PhaseKind, Tile } from "../types/enums.js";
import { getTile } from "../grid/grid.js";
import { cycleTab, moveCursor } from "../items/item-inventory.js";
import {
    describeConsumeResult, equipSelected, hasFullKit, purgeExpiredBuffs,
    unequipSelected, useSelectedConsumable,
} from "../items/item-usage.js";
import { type World, currentLevel, currentMap, logMessage } from "../state/game-state.js";
import { advanceDialogue, openNpcDialogue } from "../dialogue/dialogue.js";
import { answerChoice } from "../dialogue/dialogue-choices.js";
import { chestIndexAt, openChestDialogue } from "../dialogue/dialogue-chests.js";
import {
    openBattleInventory, resolveBattleOption, startBattle, useConsumableInBattle,
} from "../combat/combat-battle.js";
import { adjacentDoor, adjacentNpc } from "../movement/map-queries.js";
import { tryMovePlayer } from "../movement/player-movement.js";
import { enterOtherLevel } from "./game-level.js";

export const DOOR_LOCKED_HINT = "The door won't open. You need both a sword and a shield.";
export const NOTHING_NEARBY = "Nothing nearby.";

// =============================================================================
// Inventory overlay
// =============================================================================

/** UseConsumable in free roam acts on whatever tab is showing. */
function useFromActiveTab(world: World): void {
    const player = world.player;
    switch (player.inventory.tab) {
        case InvTab.Consumables: {
            const result = useSelectedConsumable(player, world.clock.now());
            logMessage(world, result ? describeConsumeResult(result) : "You have nothing to use.");
            break;
        }
        case InvTab.Backpack: {
            const result = equipSelected(player);
            if (result) {
                logMessage(world, `Equipped ${result.equipped.name}.`);
            }
            break;
        }
        case InvTab.Weapons: {
            const item = unequipSelected(player);
            if (item) {
                logMessage(world, `Unequipped ${item.name}.`);
            }
            break;
        }
    }
}

function handleInventoryAction(world: World, action: Action): boolean {
    const inv = world.player.inventory;
    switch (action.kind) {
        case ActionKind.ToggleInventory:
            world.inventoryOpen = !world.inventoryOpen;
            return true;
        case ActionKind.ToggleStats:
            world.statsOpen = !world.statsOpen;
            return true;
        case ActionKind.ToggleInvTab:
            if (world.inventoryOpen) {
                cycleTab(inv);
            }
            return true;
        case ActionKind.InventoryUp:
        case ActionKind.InventoryDown:
            if (world.inventoryOpen) {
                moveCursor(inv, action.kind === ActionKind.InventoryUp ? -1 : 1);
            }
            return true;
        case ActionKind.UseConsumable:
            if (world.inventoryOpen) {
                useFromActiveTab(world);
            }
            return true;
        default:
            return false;
    }
}

// =============================================================================
// Free roam
// =============================================================================

function interact(world: World): void {
    const npc = adjacentNpc(world);
    if (npc) {
        openNpcDialogue(world, npc);
        return;
    }
    if (adjacentDoor(world)) {
        if (hasFullKit(world.player)) {
            enterOtherLevel(world);
        } else {
            logMessage(world, DOOR_LOCKED_HINT);
        }
        return;
    }
    const { x, y } = world.player.pos;
    const chestIndex = chestIndexAt(currentLevel(world), x, y);
    if (chestIndex >= 0) {
        openChestDialogue(world, chestIndex);
        return;
    }
    logMessage(world, NOTHING_NEARBY);
}

function movePlayer(world: World, dx: number, dy: number): void {
    if (world.inventoryOpen || world.statsOpen) {
        return;
    }
    if (!tryMovePlayer(world, dx, dy)) {
        return;
    }
    const { x, y } = world.player.pos;
    if (getTile(currentMap(world), x, y) === Tile.Chest) {
        const chestIndex = chestIndexAt(currentLevel(world), x, y);
        if (chestIndex >= 0) {
            openChestDialogue(world, chestIndex);
        }
    }
}

function handlePlaying(world: World, action: Action): void {
    if (handleInventoryAction(world, action)) {
        return;
    }
    switch (action.kind) {
        case ActionKind.Move:
            movePlayer(world, action.dx, action.dy);
            break;
        case ActionKind.Interact:
            interact(world);
            break;
        default:
            break;
    }
}

// =============================================================================
// Dialogue and battle
// =============================================================================

function handleDialogue(world: World, action: Action): void {
    switch (action.kind) {
        case ActionKind.Confirm: {
            const close = advanceDialogue(world);
            if (close?.effect === DialogueCloseEffect.Battle) {
                startBattle(world, close.npc, close.playerInitiated);
            }
            break;
        }
        case ActionKind.Choice:
            answerChoice(world, action.key);
            break;
        default:
            break;
    }
}

/** The battle overlay only ever shows consumables; the tab cannot change. */
function handleBattle(world: World, action: Action): void {
    switch (action.kind) {
        case ActionKind.BattleOption:
            resolveBattleOption(world, action.option, action.penalty);
            break;
        case ActionKind.ToggleInventory:
            if (world.inventoryOpen) {
                world.inventoryOpen = false;
            } else {
                openBattleInventory(world);
            }
            break;
        case ActionKind.InventoryUp:
        case ActionKind.InventoryDown:
            if (world.inventoryOpen) {
                moveCursor(world.player.inventory, action.kind === ActionKind.InventoryUp ? -1 : 1);
            }
            break;
        case ActionKind.UseConsumable:
            if (world.inventoryOpen) {
                useConsumableInBattle(world);
            }
            break;
        default:
            break;
    }
}

// =============================================================================
// applyAction
// =============================================================================

/**
 * Apply one action. Expired buffs are purged first so every stat read
 * during the action sees only live ones. Returns false on Quit, true
 * otherwise.
 */
export function applyAction(world: World, action: Action): boolean {
    if (action.kind === ActionKind.Quit) {
        world.logger.info("quit", { phase: PhaseKind[world.phase.kind] });
        return false;
    }
    if (purgeExpiredBuffs(world.player, world.clock.now()) > 0) {
        logMessage(world, "A temporary effect wears off.");
    }

    switch (world.phase.kind) {
        case PhaseKind.Title:
            if (action.kind === ActionKind.Confirm) {
                world.phase = { kind: PhaseKind.Intro };
            }
            break;
        case PhaseKind.Intro:
            if (action.kind === ActionKind.Confirm) {
                world.phase = { kind: PhaseKind.Playing };
            }
            break;
        case PhaseKind.Playing:
            handlePlaying(world, action);
            break;
        case PhaseKind.Dialogue:
            handleDialogue(world, action);
            break;
        case PhaseKind.Battle:
            handleBattle(world, action);
            break;
        case PhaseKind.Ending:
            break;
    }
    return true;
}
