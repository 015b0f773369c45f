/*
 *  dialogue-catalog.ts — What each character says, keyed by identity
 *  hearthlight
 *
 *  Content only. The dialogue engine decides which branch to show from
 *  the identity's quest flag and applies choice outcomes; nothing here
 *  touches world state.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { NpcId, RewardPlacement } from "../types/enums.js";
import type { ConsumableKey, EquipmentKey } from "./item-catalog.js";

export interface YesNoScript {
    kind: "yesNo";
    /** Page index the question sits on. */
    page: number;
    yesPages: readonly string[];
    noPages: readonly string[];
    /** Shown instead of yesPages when the reward does not fit the pack. */
    packFullPages: readonly string[];
    reward: ConsumableKey;
}

export interface StarterScript {
    kind: "starter";
    page: number;
    /** Page shown after either item is taken. */
    afterPage: number;
    sword: EquipmentKey;
    shield: EquipmentKey;
}

export interface RewardChest {
    consumable: ConsumableKey | null;
    equipment: EquipmentKey | null;
}

export interface BattleScript {
    playerInitiated: boolean;
    victoryPages: readonly string[];
    /** Vanish from the map once beaten. */
    removeOnDefeat: boolean;
    rewards: readonly RewardChest[];
    placement: RewardPlacement;
}

export interface NpcScript {
    /** Shown while the identity's flag is unset. */
    firstPages: readonly string[];
    /** Shown once the flag is set. */
    laterPages: readonly string[];
    choice: YesNoScript | StarterScript | null;
    battle: BattleScript | null;
}

export const dialogueCatalog: Readonly<Record<NpcId, NpcScript>> = {
    [NpcId.Guide]: {
        firstPages: [
            "Welcome, traveler. This hall has been quiet for a long time.",
            "The door out of here only opens for someone carrying both a sword and a shield.",
            "I can spare one of them. Will you take the [S]word or the [B]uckler?",
            "Wear it well. You'll find the other in one of the chests around this hall.",
        ],
        laterPages: [
            "Find the missing piece and the door will let you through.",
        ],
        choice: {
            kind: "starter",
            page: 2,
            afterPage: 3,
            sword: "travelersSword",
            shield: "travelersBuckler",
        },
        battle: null,
    },
    [NpcId.Hermit]: {
        firstPages: [
            "Ah, a visitor. My knees won't carry me to the spring anymore.",
            "I brewed a tonic for whoever fetches my water. Will you help an old man? [Y]es / [N]o",
        ],
        laterPages: [
            "The spring water tastes sweeter already. Thank you, friend.",
        ],
        choice: {
            kind: "yesNo",
            page: 1,
            yesPages: [
                "Bless you. Take the tonic, you'll need it more than I do.",
            ],
            noPages: [
                "Suit yourself. Come back if you change your mind.",
            ],
            packFullPages: [
                "Your pack is stuffed full. Come back when you have room for the tonic.",
            ],
            reward: "hermitTonic",
        },
        battle: null,
    },
    [NpcId.Bandit]: {
        firstPages: [
            "Well, well. Fresh boots and a full pack.",
            "Hand it all over, or I take it off your corpse!",
        ],
        laterPages: [
            "Rook keeps well out of your way.",
        ],
        choice: null,
        battle: {
            playerInitiated: false,
            victoryPages: [
                "Enough! I yield, I yield!",
                "Rook drops a small chest as he scrambles away.",
            ],
            removeOnDefeat: true,
            rewards: [
                { consumable: "healingDraught", equipment: "banditDagger" },
            ],
            placement: RewardPlacement.Nearby,
        },
    },
    [NpcId.Warden]: {
        firstPages: [
            "None leave the hollow while I stand.",
            "Draw your blade.",
        ],
        laterPages: [
            "Only dust remains where the Warden stood.",
        ],
        choice: null,
        battle: {
            playerInitiated: true,
            victoryPages: [
                "The Warden staggers and crumbles into dust.",
                "Two chests rise from the floor where it stood.",
            ],
            removeOnDefeat: true,
            rewards: [
                { consumable: null, equipment: "wardenBlade" },
                { consumable: "healingDraught", equipment: "wardenAegis" },
            ],
            placement: RewardPlacement.Adjacent,
        },
    },
};

// ===== Fixed lines used outside character scripts =====

export const introPages: readonly string[] = [
    "You wake on cold stone with no memory of the way in.",
    "Somewhere ahead, a door waits for someone properly armed.",
];

export const welcomeMessages: readonly string[] = [
    "Welcome to Hearthlight.",
    "Move with WASD or the arrow keys. Press I for inventory.",
    "Press E to talk, open chests and try doors.",
    "Find the white door to reach Room 2.",
];
