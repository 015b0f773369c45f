/*
 *  dialogue-chests.ts — Opening chests and resolving take / use / discard
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Chest, Level } from "../types/types.js";
import { ChoiceKind, DialogueCloseEffect, Tile } from "../types/enums.js";
import { setTile } from "../grid/grid.js";
import { addConsumable, addToBackpack } from "../items/item-inventory.js";
import { applyConsumable, describeConsumeResult, equipItem } from "../items/item-usage.js";
import { type World, currentLevel, logMessage } from "../state/game-state.js";
import { closeDialogue, openDialogue } from "./dialogue.js";

export type ChestAction = "take" | "use" | "discard";

const chestKeys: Readonly<Record<string, ChestAction>> = {
    t: "take",
    u: "use",
    d: "discard",
};

export function chestActionForKey(key: string): ChestAction | null {
    return chestKeys[key] ?? null;
}

export function chestIsEmpty(chest: Chest): boolean {
    return chest.consumable === null && chest.equipment === null;
}

/** Index of the unopened chest at (x, y) on `level`, or -1. */
export function chestIndexAt(level: Level, x: number, y: number): number {
    return level.chests.findIndex((c) => !c.opened && c.pos.x === x && c.pos.y === y);
}

/** One-shot: the tile goes back to Floor and the chest never opens again. */
export function markChestOpened(level: Level, chest: Chest): void {
    chest.opened = true;
    setTile(level.map, chest.pos.x, chest.pos.y, Tile.Floor);
}

function describeContents(chest: Chest): string {
    const names: string[] = [];
    if (chest.consumable) names.push(chest.consumable.name);
    if (chest.equipment) names.push(chest.equipment.name);
    return names.join(" and ");
}

/**
 * Show what a chest holds and ask what to do with it. An empty chest is
 * opened on the spot with no dialogue. Returns whether a session opened.
 */
export function openChestDialogue(world: World, chestIndex: number): boolean {
    const level = currentLevel(world);
    const chest = level.chests[chestIndex];
    if (!chest || chest.opened) {
        return false;
    }
    if (chestIsEmpty(chest)) {
        markChestOpened(level, chest);
        logMessage(world, "The chest is empty.");
        return false;
    }

    openDialogue(world, {
        owner: { kind: "chest", chestIndex },
        title: "Chest",
        pages: [`Inside you find ${describeContents(chest)}. [T]ake, [U]se or [D]iscard?`],
        page: 0,
        choice: { kind: ChoiceKind.Chest, page: 0, chestIndex },
        onClose: { effect: DialogueCloseEffect.None },
    });
    return true;
}

function takeContents(world: World, chest: Chest): void {
    const inv = world.player.inventory;
    const taken: string[] = [];

    if (chest.consumable) {
        if (addConsumable(inv, chest.consumable)) {
            taken.push(chest.consumable.name);
            chest.consumable = null;
        } else {
            logMessage(world, `Your pack is full. The ${chest.consumable.name} stays in the chest.`);
        }
    }
    if (chest.equipment) {
        addToBackpack(inv, chest.equipment);
        taken.push(chest.equipment.name);
        chest.equipment = null;
    }
    if (taken.length > 0) {
        logMessage(world, `Took ${taken.join(" and ")}.`);
    }
}

function useContents(world: World, chest: Chest): void {
    const player = world.player;
    if (chest.consumable) {
        const result = applyConsumable(player, chest.consumable, world.clock.now());
        logMessage(world, describeConsumeResult(result));
        chest.consumable = null;
    }
    if (chest.equipment) {
        const displaced = equipItem(player, chest.equipment);
        logMessage(world, displaced
            ? `Equipped ${chest.equipment.name}; ${displaced.name} goes in your backpack.`
            : `Equipped ${chest.equipment.name}.`);
        chest.equipment = null;
    }
}

/**
 * Apply a chest choice and close the session. The chest counts as opened
 * once nothing is left in it.
 */
export function resolveChestChoice(world: World, chestIndex: number, action: ChestAction): void {
    const level = currentLevel(world);
    const chest = level.chests[chestIndex];
    closeDialogue(world);
    if (!chest || chest.opened) {
        return;
    }

    switch (action) {
        case "take":
            takeContents(world, chest);
            break;
        case "use":
            useContents(world, chest);
            break;
        case "discard":
            logMessage(world, `You leave the ${describeContents(chest)} behind.`);
            chest.consumable = null;
            chest.equipment = null;
            break;
    }

    if (chestIsEmpty(chest)) {
        markChestOpened(level, chest);
    }
}
