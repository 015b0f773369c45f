/*
 *  dialogue-choices.ts — Single-key answers to pending dialogue choices
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DialogueSession, PendingChoice } from "../types/types.js";
import { ChoiceKind, NpcId } from "../types/enums.js";
import { dialogueCatalog, type StarterScript, type YesNoScript } from "../globals/dialogue-catalog.js";
import { makeConsumable, makeEquipment } from "../globals/item-catalog.js";
import { npcDefinition } from "../globals/npc-catalog.js";
import { addConsumable, packIsFull } from "../items/item-inventory.js";
import { equipItem } from "../items/item-usage.js";
import { type World, logMessage, setFlag } from "../state/game-state.js";
import { activeDialogue, awaitingChoice, rewriteRemainingPages } from "./dialogue.js";
import { chestActionForKey, resolveChestChoice } from "./dialogue-chests.js";

function yesNoScript(npc: NpcId): YesNoScript | null {
    const choice = dialogueCatalog[npc].choice;
    return choice?.kind === "yesNo" ? choice : null;
}

function starterScript(): StarterScript | null {
    const choice = dialogueCatalog[NpcId.Guide].choice;
    return choice?.kind === "starter" ? choice : null;
}

function answerYesNo(world: World, session: DialogueSession, npc: NpcId, key: string): boolean {
    const script = yesNoScript(npc);
    if (script === null || (key !== "y" && key !== "n")) {
        return false;
    }
    if (key === "n") {
        rewriteRemainingPages(session, script.noPages);
        return true;
    }

    const inv = world.player.inventory;
    if (packIsFull(inv)) {
        rewriteRemainingPages(session, script.packFullPages);
        return true;
    }
    if (setFlag(world, npcDefinition(npc).flag)) {
        const reward = makeConsumable(script.reward);
        addConsumable(inv, reward);
        logMessage(world, `Received ${reward.name}.`);
        world.logger.debug("quest completed", { npc: npcDefinition(npc).name });
    }
    rewriteRemainingPages(session, script.yesPages);
    return true;
}

function answerStarter(world: World, session: DialogueSession, afterPage: number, key: string): boolean {
    const script = starterScript();
    if (script === null || (key !== "s" && key !== "b")) {
        return false;
    }
    const item = makeEquipment(key === "s" ? script.sword : script.shield);
    if (setFlag(world, npcDefinition(NpcId.Guide).flag)) {
        equipItem(world.player, item);
        logMessage(world, `Equipped ${item.name}.`);
    }
    session.choice = null;
    session.page = Math.min(afterPage, session.pages.length - 1);
    return true;
}

function routeChoice(world: World, session: DialogueSession, choice: PendingChoice, key: string): boolean {
    switch (choice.kind) {
        case ChoiceKind.YesNo:
            return answerYesNo(world, session, choice.npc, key);
        case ChoiceKind.Starter:
            return answerStarter(world, session, choice.afterPage, key);
        case ChoiceKind.Chest: {
            const action = chestActionForKey(key);
            if (action === null) {
                return false;
            }
            resolveChestChoice(world, choice.chestIndex, action);
            return true;
        }
    }
}

/**
 * Answer the pending choice with a single character, case-insensitively.
 * Anything unrecognised leaves the session on the same page. Returns
 * whether the key was accepted.
 */
export function answerChoice(world: World, key: string): boolean {
    const session = activeDialogue(world);
    if (session === null || key.length !== 1) {
        return false;
    }
    const choice = awaitingChoice(session);
    if (choice === null) {
        return false;
    }
    return routeChoice(world, session, choice, key.toLowerCase());
}
