/*
 *  dialogue.test.ts — Tests for dialogue sessions and quest choices
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import type { DialogueSession } from "../../src/types/types.js";
import { DialogueCloseEffect, NpcId, PhaseKind, QuestFlag } from "../../src/types/enums.js";
import { makeConsumable } from "../../src/globals/item-catalog.js";
import { addConsumable } from "../../src/items/item-inventory.js";
import type { World } from "../../src/state/game-state.js";
import {
    activeDialogue, advanceDialogue, awaitingChoice, currentPage, openNpcDialogue,
} from "../../src/dialogue/dialogue.js";
import { answerChoice } from "../../src/dialogue/dialogue-choices.js";
import { lastMessage, makeNpc, makeTestWorld } from "../helpers/test-world.js";

function session(world: World): DialogueSession {
    const active = activeDialogue(world);
    if (active === null) {
        throw new Error("expected an open dialogue");
    }
    return active;
}

function talkTo(id: NpcId): World {
    const npc = makeNpc(id, { x: 2, y: 2 });
    const { world } = makeTestWorld({ npcs: [npc] });
    openNpcDialogue(world, npc);
    return world;
}

describe("advanceDialogue", () => {
    it("pages forward, then closes back to free roam", () => {
        const world = talkTo(NpcId.Bandit);
        expect(session(world).title).toBe("Rook the Bandit");
        expect(advanceDialogue(world)).toBeNull();
        expect(session(world).page).toBe(1);
        expect(advanceDialogue(world)).toEqual({
            effect: DialogueCloseEffect.Battle,
            npc: NpcId.Bandit,
            playerInitiated: false,
        });
        expect(world.phase.kind).toBe(PhaseKind.Playing);
    });

    it("waits on a pending choice", () => {
        const world = talkTo(NpcId.Guide);
        advanceDialogue(world);
        advanceDialogue(world);
        expect(session(world).page).toBe(2);
        expect(advanceDialogue(world)).toBeNull();
        expect(session(world).page).toBe(2);
        expect(awaitingChoice(session(world))).not.toBeNull();
    });

    it("does nothing outside a dialogue", () => {
        const { world } = makeTestWorld();
        expect(advanceDialogue(world)).toBeNull();
        expect(world.phase.kind).toBe(PhaseKind.Playing);
    });
});

describe("starter choice", () => {
    it("equips the chosen piece and jumps to the follow-up page", () => {
        const world = talkTo(NpcId.Guide);
        advanceDialogue(world);
        advanceDialogue(world);
        expect(answerChoice(world, "S")).toBe(true);
        expect(world.player.inventory.sword?.name).toBe("Traveler's Sword");
        expect(world.player.inventory.shield).toBeNull();
        expect(world.flags.has(QuestFlag.StarterChosen)).toBe(true);
        expect(session(world).page).toBe(3);
        expect(advanceDialogue(world)).toEqual({ effect: DialogueCloseEffect.None });
    });

    it("ignores unrecognised keys", () => {
        const world = talkTo(NpcId.Guide);
        advanceDialogue(world);
        advanceDialogue(world);
        expect(answerChoice(world, "x")).toBe(false);
        expect(answerChoice(world, "sb")).toBe(false);
        expect(session(world).page).toBe(2);
        expect(world.flags.size).toBe(0);
    });

    it("switches to the follow-up lines once chosen", () => {
        const npc = makeNpc(NpcId.Guide, { x: 2, y: 2 });
        const { world } = makeTestWorld({ npcs: [npc], flags: new Set([QuestFlag.StarterChosen]) });
        openNpcDialogue(world, npc);
        expect(session(world).pages).toEqual(["Find the missing piece and the door will let you through."]);
        expect(session(world).choice).toBeNull();
    });
});

describe("yes/no choice", () => {
    it("rewards a yes once and rewrites the rest", () => {
        const world = talkTo(NpcId.Hermit);
        advanceDialogue(world);
        expect(answerChoice(world, "y")).toBe(true);
        expect(world.flags.has(QuestFlag.HermitQuestDone)).toBe(true);
        expect(world.player.inventory.consumables.map((c) => c.name)).toEqual(["Hermit's Tonic"]);
        expect(lastMessage(world)).toBe("Received Hermit's Tonic.");
        expect(session(world).page).toBe(2);
        expect(currentPage(session(world))).toBe("Bless you. Take the tonic, you'll need it more than I do.");
        expect(advanceDialogue(world)).toEqual({ effect: DialogueCloseEffect.None });

        openNpcDialogue(world, world.npcs[0]);
        expect(session(world).pages).toEqual(["The spring water tastes sweeter already. Thank you, friend."]);
    });

    it("leaves the quest open on a no", () => {
        const world = talkTo(NpcId.Hermit);
        advanceDialogue(world);
        expect(answerChoice(world, "N")).toBe(true);
        expect(currentPage(session(world))).toBe("Suit yourself. Come back if you change your mind.");
        expect(world.flags.size).toBe(0);
        advanceDialogue(world);

        openNpcDialogue(world, world.npcs[0]);
        expect(session(world).choice).not.toBeNull();
    });

    it("keeps the flag unset when the pack is full", () => {
        const world = talkTo(NpcId.Hermit);
        for (let i = 0; i < 10; i++) {
            addConsumable(world.player.inventory, makeConsumable("apple"));
        }
        advanceDialogue(world);
        answerChoice(world, "y");
        expect(currentPage(session(world))).toBe(
            "Your pack is stuffed full. Come back when you have room for the tonic.");
        expect(world.flags.has(QuestFlag.HermitQuestDone)).toBe(false);
        expect(world.player.inventory.consumables).toHaveLength(10);
    });
});
