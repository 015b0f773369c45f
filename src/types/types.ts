/*
 *  types.ts — Core data structures of the world model
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type {
    Tile, EquipSlot, InvTab, NpcId, PhaseKind,
    ChoiceKind, DialogueCloseEffect,
} from "./enums.js";

// ===== Pos: map coordinate =====

export interface Pos {
    x: number;
    y: number;
}

export type LevelIndex = 0 | 1;

// ===== Map =====

/** Row-major tile grid: index = y * width + x. */
export interface TileMap {
    width: number;
    height: number;
    tiles: Tile[];
}

// ===== Items =====

export interface Equipment {
    name: string;
    slot: EquipSlot;
    attack: number;
    defense: number;
    speed: number;
    /** Added to the wearer's maximum HP while equipped. */
    hp: number;
}

export interface Consumable {
    name: string;
    /** Negative values hurt. */
    heal: number;
    attackBonus: number;
    defenseBonus: number;
}

export interface TempBuff {
    attack: number;
    defense: number;
    speed: number;
    /** Absolute clock time (ms) at which the buff stops counting. */
    expiresAt: number;
}

export interface Inventory {
    sword: Equipment | null;
    shield: Equipment | null;
    consumables: Consumable[];
    /** Unequipped equipment. */
    backpack: Equipment[];
    tab: InvTab;
    /** One cursor per tab, indexed by InvTab. */
    cursors: Record<InvTab, number>;
}

// ===== Creatures =====

export interface Player {
    pos: Pos;
    hp: number;
    maxHp: number;
    baseAttack: number;
    baseDefense: number;
    baseSpeed: number;
    inventory: Inventory;
    buffs: TempBuff[];
}

export interface EnemyStats {
    hp: number;
    attack: number;
    defense: number;
    speed: number;
}

export interface Npc {
    id: NpcId;
    name: string;
    level: LevelIndex;
    pos: Pos;
    symbol: string;
}

// ===== Levels =====

export interface Chest {
    pos: Pos;
    consumable: Consumable | null;
    equipment: Equipment | null;
    /** One-shot: set when the last reward leaves the chest. */
    opened: boolean;
}

export interface Level {
    depth: number;
    map: TileMap;
    spawn: Pos;
    door: Pos;
    chests: Chest[];
}

// ===== Dialogue =====

export type DialogueOwner =
    | { kind: "npc"; npc: NpcId }
    | { kind: "chest"; chestIndex: number };

/** A choice is pending while the session sits on `page`. */
export type PendingChoice =
    | { kind: ChoiceKind.YesNo; page: number; npc: NpcId }
    | { kind: ChoiceKind.Starter; page: number; afterPage: number }
    | { kind: ChoiceKind.Chest; page: number; chestIndex: number };

export type DialogueClose =
    | { effect: DialogueCloseEffect.None }
    | { effect: DialogueCloseEffect.Battle; npc: NpcId; playerInitiated: boolean };

export interface DialogueSession {
    owner: DialogueOwner;
    title: string;
    pages: string[];
    page: number;
    choice: PendingChoice | null;
    onClose: DialogueClose;
}

// ===== Battle =====

export interface BattleSession {
    npc: NpcId;
    enemyName: string;
    enemyHp: number;
    enemyMaxHp: number;
    enemyAttack: number;
    enemyDefense: number;
    enemySpeed: number;
    /** Enemy acts first this turn. Reset after every resolved turn. */
    penalty: boolean;
    /** The player started this fight, so running away is refused. */
    playerInitiated: boolean;
    turn: number;
}

// ===== Phases =====

export type GamePhase =
    | { kind: PhaseKind.Title }
    | { kind: PhaseKind.Intro }
    | { kind: PhaseKind.Playing }
    | { kind: PhaseKind.Dialogue; session: DialogueSession }
    | { kind: PhaseKind.Battle; session: BattleSession }
    | { kind: PhaseKind.Ending; outcome: "defeat" };
