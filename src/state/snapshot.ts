/*
 *  snapshot.ts — Read-only view of the world for renderers
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type {
    BattleSession, Chest, DialogueSession, Inventory, LevelIndex, Npc, Pos, TempBuff, TileMap,
} from "../types/types.js";
import { PhaseKind, type QuestFlag } from "../types/enums.js";
import { introPages } from "../globals/dialogue-catalog.js";
import { recentMessages } from "../io/io-messages.js";
import {
    buffIsActive, effectiveAttack, effectiveDefense, effectiveSpeed,
} from "../items/item-usage.js";
import { type World, currentLevel, npcsOnCurrentLevel } from "./game-state.js";

type DeepReadonly<T> =
    T extends (infer U)[] ? readonly DeepReadonly<U>[]
        : T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
            : T;

export interface PlayerView {
    pos: Pos;
    hp: number;
    maxHp: number;
    attack: number;
    defense: number;
    speed: number;
    inventory: Inventory;
    buffs: TempBuff[];
}

interface SnapshotData {
    seed: string;
    phase: PhaseKind;
    levelIndex: LevelIndex;
    map: TileMap;
    door: Pos;
    chests: Chest[];
    player: PlayerView;
    npcs: Npc[];
    messages: string[];
    /** Intro text, present only while the Intro phase is showing. */
    intro: string[] | null;
    dialogue: DialogueSession | null;
    battle: BattleSession | null;
    inventoryOpen: boolean;
    statsOpen: boolean;
    flags: QuestFlag[];
}

export type WorldSnapshot = DeepReadonly<SnapshotData>;

/**
 * Copy out everything a renderer needs. The copy shares nothing with the
 * world, so holding on to it across later actions is safe.
 */
export function snapshotWorld(world: World): WorldSnapshot {
    const now = world.clock.now();
    const level = currentLevel(world);
    const { phase, player } = world;

    const data: SnapshotData = {
        seed: world.seed.toString(),
        phase: phase.kind,
        levelIndex: world.current,
        map: structuredClone(level.map),
        door: { ...level.door },
        chests: structuredClone(level.chests.filter((c) => !c.opened)),
        player: {
            pos: { ...player.pos },
            hp: player.hp,
            maxHp: player.maxHp,
            attack: effectiveAttack(player, now),
            defense: effectiveDefense(player, now),
            speed: effectiveSpeed(player, now),
            inventory: structuredClone(player.inventory),
            buffs: player.buffs.filter((b) => buffIsActive(b, now)).map((b) => ({ ...b })),
        },
        npcs: structuredClone(npcsOnCurrentLevel(world)),
        messages: recentMessages(world.log),
        intro: phase.kind === PhaseKind.Intro ? [...introPages] : null,
        dialogue: phase.kind === PhaseKind.Dialogue ? structuredClone(phase.session) : null,
        battle: phase.kind === PhaseKind.Battle ? { ...phase.session } : null,
        inventoryOpen: world.inventoryOpen,
        statsOpen: world.statsOpen,
        flags: [...world.flags].sort((a, b) => a - b),
    };
    return data;
}
