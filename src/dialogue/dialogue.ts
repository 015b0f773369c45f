/*
 *  dialogue.ts — Paginated dialogue sessions
 *  hearthlight
 *
 *  A session lives inside the Dialogue phase. Confirm pages forward;
 *  stepping past the last page closes the session and hands its close
 *  effect back to the caller, which decides what happens next (free roam
 *  or a battle). A session parked on its choice page waits for an answer.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DialogueClose, DialogueSession, Npc, PendingChoice } from "../types/types.js";
import { ChoiceKind, DialogueCloseEffect, NpcId, PhaseKind } from "../types/enums.js";
import { dialogueCatalog, type NpcScript } from "../globals/dialogue-catalog.js";
import { npcDefinition } from "../globals/npc-catalog.js";
import { type World, hasFlag } from "../state/game-state.js";

const NO_EFFECT: DialogueClose = { effect: DialogueCloseEffect.None };

// =============================================================================
// Session queries
// =============================================================================

export function activeDialogue(world: World): DialogueSession | null {
    return world.phase.kind === PhaseKind.Dialogue ? world.phase.session : null;
}

/** The choice waiting on the current page, if any. */
export function awaitingChoice(session: DialogueSession): PendingChoice | null {
    return session.choice !== null && session.choice.page === session.page ? session.choice : null;
}

export function currentPage(session: DialogueSession): string {
    return session.pages[session.page] ?? "";
}

// =============================================================================
// Opening sessions
// =============================================================================

export function openDialogue(world: World, session: DialogueSession): void {
    world.inventoryOpen = false;
    world.statsOpen = false;
    world.phase = { kind: PhaseKind.Dialogue, session };
}

function scriptChoice(script: NpcScript, npc: NpcId): PendingChoice | null {
    const choice = script.choice;
    if (choice === null) {
        return null;
    }
    switch (choice.kind) {
        case "yesNo":
            return { kind: ChoiceKind.YesNo, page: choice.page, npc };
        case "starter":
            return { kind: ChoiceKind.Starter, page: choice.page, afterPage: choice.afterPage };
    }
}

/**
 * Start talking to `npc`. Content branches on the identity's quest flag:
 * before it is set, the first-meeting pages (with any choice and battle);
 * afterwards, the short follow-up lines.
 */
export function openNpcDialogue(world: World, npc: Npc): void {
    const definition = npcDefinition(npc.id);
    const script = dialogueCatalog[npc.id];
    const done = hasFlag(world, definition.flag);

    let onClose = NO_EFFECT;
    if (!done && script.battle !== null) {
        onClose = {
            effect: DialogueCloseEffect.Battle,
            npc: npc.id,
            playerInitiated: script.battle.playerInitiated,
        };
    }

    openDialogue(world, {
        owner: { kind: "npc", npc: npc.id },
        title: npc.name,
        pages: [...(done ? script.laterPages : script.firstPages)],
        page: 0,
        choice: done ? null : scriptChoice(script, npc.id),
        onClose,
    });
}

/** Lines spoken after the player wins. Closing them leads back to free roam. */
export function openPostBattleDialogue(world: World, npcId: NpcId): void {
    const script = dialogueCatalog[npcId];
    openDialogue(world, {
        owner: { kind: "npc", npc: npcId },
        title: npcDefinition(npcId).name,
        pages: [...(script.battle?.victoryPages ?? script.laterPages)],
        page: 0,
        choice: null,
        onClose: NO_EFFECT,
    });
}

// =============================================================================
// Advancing
// =============================================================================

/** Leave the Dialogue phase for free roam and return the session's close effect. */
export function closeDialogue(world: World): DialogueClose {
    const session = activeDialogue(world);
    world.phase = { kind: PhaseKind.Playing };
    return session?.onClose ?? NO_EFFECT;
}

/**
 * Confirm: next page, or close after the last one. Returns the close
 * effect when the session ended, null while it stays open.
 */
export function advanceDialogue(world: World): DialogueClose | null {
    const session = activeDialogue(world);
    if (session === null || awaitingChoice(session) !== null) {
        return null;
    }
    if (session.page < session.pages.length - 1) {
        session.page++;
        return null;
    }
    return closeDialogue(world);
}

/** Replace everything after the current page with `pages` and move onto them. */
export function rewriteRemainingPages(session: DialogueSession, pages: readonly string[]): void {
    session.pages = [...session.pages.slice(0, session.page + 1), ...pages];
    session.choice = null;
    if (session.page < session.pages.length - 1) {
        session.page++;
    }
}
