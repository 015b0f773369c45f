/*
 *  npc-catalog.ts — The fixed roster of non-player characters
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { EnemyStats, LevelIndex } from "../types/types.js";
import { NpcId, QuestFlag } from "../types/enums.js";

export interface NpcDefinition {
    id: NpcId;
    name: string;
    symbol: string;
    level: LevelIndex;
    /** Set once this identity's quest or fight is done. */
    flag: QuestFlag;
    /** Present for characters that can be fought. */
    enemy: Readonly<EnemyStats> | null;
}

/** Indexed by NpcId. Placement order within a level follows this order. */
export const npcCatalog: readonly Readonly<NpcDefinition>[] = [
    {
        id: NpcId.Guide,
        name: "Maren the Guide",
        symbol: "G",
        level: 0,
        flag: QuestFlag.StarterChosen,
        enemy: null,
    },
    {
        id: NpcId.Hermit,
        name: "Oswin the Hermit",
        symbol: "H",
        level: 0,
        flag: QuestFlag.HermitQuestDone,
        enemy: null,
    },
    {
        id: NpcId.Bandit,
        name: "Rook the Bandit",
        symbol: "R",
        level: 1,
        flag: QuestFlag.BanditDefeated,
        enemy: { hp: 18, attack: 4, defense: 2, speed: 4 },
    },
    {
        id: NpcId.Warden,
        name: "The Hollow Warden",
        symbol: "W",
        level: 1,
        flag: QuestFlag.WardenDefeated,
        enemy: { hp: 40, attack: 7, defense: 8, speed: 7 },
    },
];

export function npcDefinition(id: NpcId): Readonly<NpcDefinition> {
    return npcCatalog[id];
}
