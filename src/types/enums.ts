/*
 *  enums.ts — Enumerations shared across the simulation
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== Tile =====

export enum Tile {
    Wall,
    Floor,
    Door,
    Chest,
}

// ===== Equipment =====

export enum EquipSlot {
    Sword,
    Shield,
}

// ===== Inventory tabs =====

/** Cycles in declaration order: Weapons → Consumables → Backpack → Weapons. */
export enum InvTab {
    Weapons,
    Consumables,
    Backpack,
}

// ===== Game phases =====

export enum PhaseKind {
    Title,
    Intro,
    Playing,
    Dialogue,
    Battle,
    Ending,
}

// ===== Non-player characters =====

export enum NpcId {
    Guide,
    Hermit,
    Bandit,
    Warden,
}

/** One-way quest flags. Once set, never cleared. */
export enum QuestFlag {
    StarterChosen,
    HermitQuestDone,
    BanditDefeated,
    WardenDefeated,
}

// ===== Dialogue =====

export enum ChoiceKind {
    YesNo,
    Starter,
    Chest,
}

export enum DialogueCloseEffect {
    None,
    Battle,
}

/** Where reward chests appear after an enemy falls. */
export enum RewardPlacement {
    /** First free neighbours of the fallen enemy, in fixed scan order. */
    Adjacent,
    /** A random floor tile near the fallen enemy. */
    Nearby,
}

// ===== Battle =====

export enum BattleOption {
    Fight = 1,
    Inventory = 2,
    Run = 3,
}

export enum BattleOutcome {
    Continue,
    Victory,
    Defeat,
    Fled,
}

// ===== Actions =====

export enum ActionKind {
    Move,
    ToggleInventory,
    InventoryUp,
    InventoryDown,
    UseConsumable,
    ToggleStats,
    ToggleInvTab,
    Confirm,
    Interact,
    Choice,
    BattleOption,
    Quit,
    None,
}
