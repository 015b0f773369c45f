/*
 *  item-catalog.ts — Consumable and equipment definitions, chest loot
 *  hearthlight
 *
 *  Catalog entries are frozen templates. Anything handed to the world is
 *  a fresh copy, so mutating an inventory never touches the catalog.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Consumable, Equipment } from "../types/types.js";
import { EquipSlot } from "../types/enums.js";
import type { RandomStream } from "../math/rng.js";

// =============================================================================
// Consumables
// =============================================================================

export const consumableCatalog = Object.freeze({
    apple:          Object.freeze({ name: "Apple",           heal: 5,  attackBonus: 0, defenseBonus: 0 }),
    healingDraught: Object.freeze({ name: "Healing Draught", heal: 15, attackBonus: 0, defenseBonus: 0 }),
    bitterRoot:     Object.freeze({ name: "Bitter Root",     heal: -2, attackBonus: 0, defenseBonus: 5 }),
    fireTonic:      Object.freeze({ name: "Fire Tonic",      heal: 0,  attackBonus: 4, defenseBonus: 0 }),
    hermitTonic:    Object.freeze({ name: "Hermit's Tonic",  heal: 10, attackBonus: 0, defenseBonus: 2 }),
} satisfies Record<string, Consumable>);

export type ConsumableKey = keyof typeof consumableCatalog;

// =============================================================================
// Equipment
// =============================================================================

export const equipmentCatalog = Object.freeze({
    rustySword:       Object.freeze({ name: "Rusty Sword",        slot: EquipSlot.Sword,  attack: 3, defense: 0, speed: 0, hp: 0 }),
    ironSword:        Object.freeze({ name: "Iron Sword",         slot: EquipSlot.Sword,  attack: 5, defense: 0, speed: 0, hp: 0 }),
    travelersSword:   Object.freeze({ name: "Traveler's Sword",   slot: EquipSlot.Sword,  attack: 4, defense: 0, speed: 1, hp: 0 }),
    banditDagger:     Object.freeze({ name: "Bandit's Dagger",    slot: EquipSlot.Sword,  attack: 3, defense: 0, speed: 2, hp: 0 }),
    wardenBlade:      Object.freeze({ name: "Warden's Blade",     slot: EquipSlot.Sword,  attack: 8, defense: 0, speed: 1, hp: 0 }),
    woodenShield:     Object.freeze({ name: "Wooden Shield",      slot: EquipSlot.Shield, attack: 0, defense: 3, speed: 0, hp: 0 }),
    kiteShield:       Object.freeze({ name: "Kite Shield",        slot: EquipSlot.Shield, attack: 0, defense: 5, speed: -1, hp: 5 }),
    travelersBuckler: Object.freeze({ name: "Traveler's Buckler", slot: EquipSlot.Shield, attack: 0, defense: 3, speed: 1, hp: 0 }),
    wardenAegis:      Object.freeze({ name: "Warden's Aegis",     slot: EquipSlot.Shield, attack: 0, defense: 7, speed: 0, hp: 10 }),
} satisfies Record<string, Equipment>);

export type EquipmentKey = keyof typeof equipmentCatalog;

export function makeConsumable(key: ConsumableKey): Consumable {
    return { ...consumableCatalog[key] };
}

export function makeEquipment(key: EquipmentKey): Equipment {
    return { ...equipmentCatalog[key] };
}

// =============================================================================
// Chest loot
// =============================================================================

export interface ChestContents {
    consumable: Consumable | null;
    equipment: Equipment | null;
}

const commonConsumables: readonly ConsumableKey[] = ["apple", "healingDraught", "bitterRoot", "fireTonic"];
const deepEquipment: readonly EquipmentKey[] = ["ironSword", "kiteShield"];

/**
 * Room 1 always hides a sword and a shield, so its door can be opened
 * whichever starter piece the player picked. Deeper chests are random.
 */
export function rollChestContents(depth: number, chestIndex: number, rng: RandomStream): ChestContents {
    if (depth === 0) {
        switch (chestIndex) {
            case 0:
                return { consumable: makeConsumable("apple"), equipment: makeEquipment("rustySword") };
            case 1:
                return { consumable: null, equipment: makeEquipment("woodenShield") };
            default:
                return { consumable: makeConsumable(rng.pick(commonConsumables)), equipment: null };
        }
    }

    const consumable = makeConsumable(rng.pick(commonConsumables));
    const equipment = rng.percent(50) ? makeEquipment(rng.pick(deepEquipment)) : null;
    return { consumable, equipment };
}
