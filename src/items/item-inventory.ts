/*
 *  item-inventory.ts — Inventory lists, tabs and cursors
 *  hearthlight
 *
 *  Every operation that changes a list length re-clamps the cursors, so a
 *  cursor is always a valid index into its list, or 0 when the list is
 *  empty.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Consumable, Equipment, Inventory } from "../types/types.js";
import { InvTab } from "../types/enums.js";
import { CONSUMABLE_CAP } from "../types/constants.js";
import { clamp } from "../math/rng.js";

const TAB_ORDER: readonly InvTab[] = [InvTab.Weapons, InvTab.Consumables, InvTab.Backpack];

export function createInventory(): Inventory {
    return {
        sword: null,
        shield: null,
        consumables: [],
        backpack: [],
        tab: InvTab.Weapons,
        cursors: {
            [InvTab.Weapons]: 0,
            [InvTab.Consumables]: 0,
            [InvTab.Backpack]: 0,
        },
    };
}

// =============================================================================
// Lists
// =============================================================================

/** Equipped items in display order: sword first, then shield. */
export function weaponsList(inv: Inventory): Equipment[] {
    const list: Equipment[] = [];
    if (inv.sword) list.push(inv.sword);
    if (inv.shield) list.push(inv.shield);
    return list;
}

export function tabLength(inv: Inventory, tab: InvTab): number {
    switch (tab) {
        case InvTab.Weapons:
            return weaponsList(inv).length;
        case InvTab.Consumables:
            return inv.consumables.length;
        case InvTab.Backpack:
            return inv.backpack.length;
    }
}

// =============================================================================
// Cursors and tabs
// =============================================================================

export function clampCursors(inv: Inventory): void {
    for (const tab of TAB_ORDER) {
        const len = tabLength(inv, tab);
        inv.cursors[tab] = len === 0 ? 0 : clamp(inv.cursors[tab], 0, len - 1);
    }
}

/** Step the active tab's cursor, wrapping at either end. */
export function moveCursor(inv: Inventory, delta: number): void {
    const len = tabLength(inv, inv.tab);
    if (len === 0) {
        inv.cursors[inv.tab] = 0;
        return;
    }
    inv.cursors[inv.tab] = (((inv.cursors[inv.tab] + delta) % len) + len) % len;
}

/** Weapons → Consumables → Backpack → Weapons. */
export function cycleTab(inv: Inventory): void {
    inv.tab = TAB_ORDER[(TAB_ORDER.indexOf(inv.tab) + 1) % TAB_ORDER.length];
    clampCursors(inv);
}

export function setTab(inv: Inventory, tab: InvTab): void {
    inv.tab = tab;
    clampCursors(inv);
}

export function selectedIndex(inv: Inventory, tab: InvTab = inv.tab): number {
    return inv.cursors[tab];
}

// =============================================================================
// Consumables
// =============================================================================

export function packIsFull(inv: Inventory): boolean {
    return inv.consumables.length >= CONSUMABLE_CAP;
}

/** Append a consumable. Returns false, leaving the pack as it was, at the cap. */
export function addConsumable(inv: Inventory, item: Consumable): boolean {
    if (packIsFull(inv)) {
        return false;
    }
    inv.consumables.push(item);
    clampCursors(inv);
    return true;
}

export function selectedConsumable(inv: Inventory): Consumable | null {
    return inv.consumables[selectedIndex(inv, InvTab.Consumables)] ?? null;
}

/** Remove and return the consumable under the Consumables cursor. */
export function takeSelectedConsumable(inv: Inventory): Consumable | null {
    if (inv.consumables.length === 0) {
        return null;
    }
    const [item] = inv.consumables.splice(selectedIndex(inv, InvTab.Consumables), 1);
    clampCursors(inv);
    return item ?? null;
}

// =============================================================================
// Backpack
// =============================================================================

export function addToBackpack(inv: Inventory, item: Equipment): void {
    inv.backpack.push(item);
    clampCursors(inv);
}

/** Remove and return the backpack item under the Backpack cursor. */
export function takeSelectedBackpackItem(inv: Inventory): Equipment | null {
    if (inv.backpack.length === 0) {
        return null;
    }
    const [item] = inv.backpack.splice(selectedIndex(inv, InvTab.Backpack), 1);
    clampCursors(inv);
    return item ?? null;
}
