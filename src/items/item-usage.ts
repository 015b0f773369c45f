/*
 *  item-usage.ts — Equipping, consuming and timed stat buffs
 *  hearthlight
 *
 *  Attack, defense and speed are never stored; they are derived on demand
 *  from base stats, equipped items and the buffs still active at `now`.
 *  Maximum HP is the exception: it moves with the HP bonus of whatever is
 *  equipped, and current HP is clamped down to follow it.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Consumable, Equipment, Player, Pos, TempBuff } from "../types/types.js";
import { EquipSlot, InvTab } from "../types/enums.js";
import {
    PLAYER_BASE_HP, PLAYER_BASE_ATTACK, PLAYER_BASE_DEFENSE, PLAYER_BASE_SPEED,
    BUFF_DURATION_MS,
} from "../types/constants.js";
import { clamp } from "../math/rng.js";
import {
    createInventory, addToBackpack, clampCursors, selectedIndex, weaponsList,
    takeSelectedConsumable, takeSelectedBackpackItem,
} from "./item-inventory.js";

// =============================================================================
// Player
// =============================================================================

export function createPlayer(pos: Pos): Player {
    return {
        pos: { ...pos },
        hp: PLAYER_BASE_HP,
        maxHp: PLAYER_BASE_HP,
        baseAttack: PLAYER_BASE_ATTACK,
        baseDefense: PLAYER_BASE_DEFENSE,
        baseSpeed: PLAYER_BASE_SPEED,
        inventory: createInventory(),
        buffs: [],
    };
}

export function hasFullKit(player: Player): boolean {
    return player.inventory.sword !== null && player.inventory.shield !== null;
}

// =============================================================================
// Buffs and derived stats
// =============================================================================

export function buffIsActive(buff: TempBuff, now: number): boolean {
    return now < buff.expiresAt;
}

/** Drop buffs that have run out. Returns how many were removed. */
export function purgeExpiredBuffs(player: Player, now: number): number {
    const before = player.buffs.length;
    player.buffs = player.buffs.filter((b) => buffIsActive(b, now));
    return before - player.buffs.length;
}

function buffTotal(player: Player, now: number, stat: "attack" | "defense" | "speed"): number {
    let total = 0;
    for (const buff of player.buffs) {
        if (buffIsActive(buff, now)) {
            total += buff[stat];
        }
    }
    return total;
}

function equipmentTotal(player: Player, stat: "attack" | "defense" | "speed"): number {
    const { sword, shield } = player.inventory;
    return (sword?.[stat] ?? 0) + (shield?.[stat] ?? 0);
}

export function effectiveAttack(player: Player, now: number): number {
    return player.baseAttack + equipmentTotal(player, "attack") + buffTotal(player, now, "attack");
}

export function effectiveDefense(player: Player, now: number): number {
    return player.baseDefense + equipmentTotal(player, "defense") + buffTotal(player, now, "defense");
}

export function effectiveSpeed(player: Player, now: number): number {
    return player.baseSpeed + equipmentTotal(player, "speed") + buffTotal(player, now, "speed");
}

// =============================================================================
// Equipment
// =============================================================================

function adjustMaxHp(player: Player, delta: number): void {
    player.maxHp += delta;
    if (player.hp > player.maxHp) {
        player.hp = player.maxHp;
    }
}

/**
 * Put `item` in its slot. Whatever was there goes to the backpack and is
 * returned.
 */
export function equipItem(player: Player, item: Equipment): Equipment | null {
    const inv = player.inventory;
    const displaced = item.slot === EquipSlot.Sword ? inv.sword : inv.shield;

    if (displaced) {
        addToBackpack(inv, displaced);
    }
    if (item.slot === EquipSlot.Sword) {
        inv.sword = item;
    } else {
        inv.shield = item;
    }
    // Net change in one step: clamp only against the new maximum.
    adjustMaxHp(player, item.hp - (displaced?.hp ?? 0));
    clampCursors(inv);
    return displaced;
}

/** Move the item in `slot` to the backpack. Returns it, or null if the slot was empty. */
export function unequipSlot(player: Player, slot: EquipSlot): Equipment | null {
    const inv = player.inventory;
    const item = slot === EquipSlot.Sword ? inv.sword : inv.shield;
    if (!item) {
        return null;
    }
    if (slot === EquipSlot.Sword) {
        inv.sword = null;
    } else {
        inv.shield = null;
    }
    adjustMaxHp(player, -item.hp);
    addToBackpack(inv, item);
    return item;
}

/** Unequip whichever item the Weapons cursor points at. */
export function unequipSelected(player: Player): Equipment | null {
    const selected = weaponsList(player.inventory)[selectedIndex(player.inventory, InvTab.Weapons)];
    return selected ? unequipSlot(player, selected.slot) : null;
}

export interface EquipResult {
    equipped: Equipment;
    displaced: Equipment | null;
}

/** Equip the backpack item under the Backpack cursor. */
export function equipSelected(player: Player): EquipResult | null {
    const item = takeSelectedBackpackItem(player.inventory);
    if (!item) {
        return null;
    }
    return { equipped: item, displaced: equipItem(player, item) };
}

// =============================================================================
// Consumables
// =============================================================================

export interface ConsumeResult {
    item: Consumable;
    /** Actual HP change after clamping. */
    healed: number;
    buff: TempBuff | null;
}

/**
 * Apply a consumable: HP moves by its heal amount, clamped to [1, maxHp]
 * so food alone never knocks the player out, and a non-zero attack or
 * defense bonus installs a timed buff.
 */
export function applyConsumable(player: Player, item: Consumable, now: number): ConsumeResult {
    const before = player.hp;
    player.hp = clamp(player.hp + item.heal, Math.min(1, player.hp), player.maxHp);

    let buff: TempBuff | null = null;
    if (item.attackBonus !== 0 || item.defenseBonus !== 0) {
        buff = {
            attack: item.attackBonus,
            defense: item.defenseBonus,
            speed: 0,
            expiresAt: now + BUFF_DURATION_MS,
        };
        player.buffs.push(buff);
    }
    return { item, healed: player.hp - before, buff };
}

/** Consume the item under the Consumables cursor, or null if the pack is empty. */
export function useSelectedConsumable(player: Player, now: number): ConsumeResult | null {
    const item = takeSelectedConsumable(player.inventory);
    return item ? applyConsumable(player, item, now) : null;
}

// =============================================================================
// Messages
// =============================================================================

function signed(n: number): string {
    return n >= 0 ? `+${n}` : `${n}`;
}

export function describeConsumeResult(result: ConsumeResult): string {
    let text = `Used ${result.item.name} (${signed(result.healed)} HP)`;
    if (result.buff) {
        const parts: string[] = [];
        if (result.buff.attack !== 0) parts.push(`${signed(result.buff.attack)} ATK`);
        if (result.buff.defense !== 0) parts.push(`${signed(result.buff.defense)} DEF`);
        text += `, ${parts.join(" ")} for ${BUFF_DURATION_MS / 1000}s`;
    }
    return `${text}.`;
}
