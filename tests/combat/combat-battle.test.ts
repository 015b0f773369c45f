/*
 *  combat-battle.test.ts — Tests for battle sessions and their outcomes
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import type { BattleSession } from "../../src/types/types.js";
import {
    BattleOption, BattleOutcome, InvTab, NpcId, PhaseKind, QuestFlag, Tile,
} from "../../src/types/enums.js";
import { chebyshevDistance, getTile } from "../../src/grid/grid.js";
import { makeConsumable } from "../../src/globals/item-catalog.js";
import { addConsumable } from "../../src/items/item-inventory.js";
import { createPlayer } from "../../src/items/item-usage.js";
import type { World } from "../../src/state/game-state.js";
import {
    activeBattle, openBattleInventory, startBattle, resolveBattleOption, useConsumableInBattle,
} from "../../src/combat/combat-battle.js";
import { lastMessage, makeNpc, makeTestWorld } from "../helpers/test-world.js";

/** Room 2 with one fighter at (5, 5) and the player just west of it. */
function battleWorld(npc: NpcId): World {
    const player = createPlayer({ x: 4, y: 5 });
    player.baseDefense = 0;
    const { world } = makeTestWorld({ current: 1, player, npcs: [makeNpc(npc, { x: 5, y: 5 })] });
    return world;
}

function session(world: World): BattleSession {
    const battle = activeBattle(world);
    if (battle === null) {
        throw new Error("expected an active battle");
    }
    return battle;
}

describe("startBattle", () => {
    it("opens a session with the enemy's catalog stats", () => {
        const world = battleWorld(NpcId.Bandit);
        expect(startBattle(world, NpcId.Bandit, false)).toBe(true);
        expect(session(world)).toEqual({
            npc: NpcId.Bandit,
            enemyName: "Rook the Bandit",
            enemyHp: 18,
            enemyMaxHp: 18,
            enemyAttack: 4,
            enemyDefense: 2,
            enemySpeed: 4,
            penalty: false,
            playerInitiated: false,
            turn: 0,
        });
        expect(lastMessage(world)).toBe("Rook the Bandit attacks!");
    });

    it("refuses characters without combat stats", () => {
        const world = battleWorld(NpcId.Guide);
        expect(startBattle(world, NpcId.Guide, true)).toBe(false);
        expect(world.phase.kind).toBe(PhaseKind.Playing);
    });
});

describe("Fight", () => {
    it("lands 12 damage per hit from attack 10 on defense 0", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.baseAttack = 10;
        startBattle(world, NpcId.Bandit, false);
        const battle = session(world);
        battle.enemyDefense = 0;
        battle.enemyHp = 100;
        battle.enemyMaxHp = 100;

        expect(resolveBattleOption(world, BattleOption.Fight, false)).toBe(BattleOutcome.Continue);
        expect(battle.enemyHp).toBe(88);
        expect(world.player.hp).toBe(26);
        expect(resolveBattleOption(world, BattleOption.Fight, false)).toBe(BattleOutcome.Continue);
        expect(battle.enemyHp).toBe(76);
        expect(battle.turn).toBe(2);
    });

    it("never raises either side's HP between turns", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.hp = 500;
        world.player.maxHp = 500;
        world.player.baseDefense = 2;
        startBattle(world, NpcId.Bandit, false);
        const battle = session(world);
        battle.enemyHp = 300;
        let enemyHp = battle.enemyHp;
        let playerHp = world.player.hp;
        for (let turn = 0; turn < 20; turn++) {
            resolveBattleOption(world, BattleOption.Fight, turn % 3 === 0);
            expect(battle.enemyHp).toBeLessThanOrEqual(enemyHp);
            expect(world.player.hp).toBeLessThanOrEqual(playerHp);
            enemyHp = battle.enemyHp;
            playerHp = world.player.hp;
        }
    });

    it("clears the penalty after the turn", () => {
        const world = battleWorld(NpcId.Bandit);
        startBattle(world, NpcId.Bandit, false);
        resolveBattleOption(world, BattleOption.Fight, true);
        expect(session(world).penalty).toBe(false);
    });
});

describe("defeat", () => {
    it("ends in the Ending phase and skips the knocked-out side", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.hp = 1;
        startBattle(world, NpcId.Bandit, false);
        expect(resolveBattleOption(world, BattleOption.Fight, true)).toBe(BattleOutcome.Defeat);
        expect(world.player.hp).toBe(0);
        expect(world.phase).toEqual({ kind: PhaseKind.Ending, outcome: "defeat" });
        expect(world.npcs).toHaveLength(1);
    });
});

describe("victory", () => {
    it("removes the Bandit and drops a chest nearby", () => {
        const world = battleWorld(NpcId.Bandit);
        startBattle(world, NpcId.Bandit, false);
        const battle = session(world);
        battle.enemyHp = 1;
        battle.enemyDefense = 0;

        expect(resolveBattleOption(world, BattleOption.Fight, false)).toBe(BattleOutcome.Victory);
        expect(world.flags.has(QuestFlag.BanditDefeated)).toBe(true);
        expect(world.npcs).toHaveLength(0);
        expect(world.player.hp).toBe(30);

        const level = world.levels[1];
        expect(level.chests).toHaveLength(1);
        const [chest] = level.chests;
        expect(chebyshevDistance(chest.pos, { x: 5, y: 5 })).toBeLessThanOrEqual(3);
        expect(chest.pos).not.toEqual({ x: 4, y: 5 });
        expect(getTile(level.map, chest.pos.x, chest.pos.y)).toBe(Tile.Chest);
        expect(chest.consumable?.name).toBe("Healing Draught");
        expect(chest.equipment?.name).toBe("Bandit's Dagger");

        expect(world.phase.kind).toBe(PhaseKind.Dialogue);
        if (world.phase.kind === PhaseKind.Dialogue) {
            expect(world.phase.session.pages).toEqual([
                "Enough! I yield, I yield!",
                "Rook drops a small chest as he scrambles away.",
            ]);
        }
    });

    it("raises the Warden's chests on the first free neighbours", () => {
        const player = createPlayer({ x: 4, y: 4 });
        player.baseDefense = 0;
        const { world } = makeTestWorld({
            current: 1,
            player,
            npcs: [makeNpc(NpcId.Warden, { x: 5, y: 5 })],
        });
        startBattle(world, NpcId.Warden, true);
        const battle = session(world);
        battle.enemyHp = 1;
        battle.enemyDefense = 0;

        expect(resolveBattleOption(world, BattleOption.Fight, false)).toBe(BattleOutcome.Victory);
        expect(world.player.hp).toBe(22);
        expect(world.levels[1].chests.map((c) => c.pos)).toEqual([{ x: 5, y: 4 }, { x: 6, y: 4 }]);
        expect(world.levels[1].chests.map((c) => c.equipment?.name)).toEqual([
            "Warden's Blade",
            "Warden's Aegis",
        ]);
        expect(world.flags.has(QuestFlag.WardenDefeated)).toBe(true);
    });
});

describe("Run", () => {
    it("is refused in a fight the player started", () => {
        const world = battleWorld(NpcId.Warden);
        startBattle(world, NpcId.Warden, true);
        expect(resolveBattleOption(world, BattleOption.Run, false)).toBe(BattleOutcome.Continue);
        expect(world.phase.kind).toBe(PhaseKind.Battle);
        expect(world.player.hp).toBe(22);
        expect(lastMessage(world)).toBe("The Hollow Warden hits you for 8.");
    });

    it("eventually escapes an ambush and leaves the enemy in place", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.hp = 1000;
        world.player.maxHp = 1000;
        startBattle(world, NpcId.Bandit, false);
        let outcome = BattleOutcome.Continue;
        for (let i = 0; i < 60 && outcome !== BattleOutcome.Fled; i++) {
            outcome = resolveBattleOption(world, BattleOption.Run, false);
        }
        expect(outcome).toBe(BattleOutcome.Fled);
        expect(world.phase.kind).toBe(PhaseKind.Playing);
        expect(activeBattle(world)).toBeNull();
        expect(world.npcs).toHaveLength(1);
        expect(world.flags.has(QuestFlag.BanditDefeated)).toBe(false);
    });

    it("closes the battle inventory on a successful escape", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.hp = 1000;
        world.player.maxHp = 1000;
        startBattle(world, NpcId.Bandit, false);
        openBattleInventory(world);
        let outcome = BattleOutcome.Continue;
        for (let i = 0; i < 60 && outcome !== BattleOutcome.Fled; i++) {
            outcome = resolveBattleOption(world, BattleOption.Run, false);
        }
        expect(outcome).toBe(BattleOutcome.Fled);
        expect(world.phase.kind).toBe(PhaseKind.Playing);
        expect(world.inventoryOpen).toBe(false);
    });
});

describe("battle inventory", () => {
    it("opens on the Consumables tab without spending the turn", () => {
        const world = battleWorld(NpcId.Bandit);
        startBattle(world, NpcId.Bandit, false);
        expect(resolveBattleOption(world, BattleOption.Inventory, false)).toBe(BattleOutcome.Continue);
        expect(world.inventoryOpen).toBe(true);
        expect(world.player.inventory.tab).toBe(InvTab.Consumables);
        expect(session(world).turn).toBe(0);
    });

    it("spends the turn when a consumable is used", () => {
        const world = battleWorld(NpcId.Bandit);
        world.player.hp = 20;
        addConsumable(world.player.inventory, makeConsumable("apple"));
        startBattle(world, NpcId.Bandit, false);
        resolveBattleOption(world, BattleOption.Inventory, false);

        expect(useConsumableInBattle(world)).toBe(BattleOutcome.Continue);
        expect(world.player.hp).toBe(21);
        expect(session(world).turn).toBe(1);
        expect(world.inventoryOpen).toBe(false);
    });

    it("costs nothing with an empty pack", () => {
        const world = battleWorld(NpcId.Bandit);
        startBattle(world, NpcId.Bandit, false);
        expect(useConsumableInBattle(world)).toBe(BattleOutcome.Continue);
        expect(lastMessage(world)).toBe("You have nothing to use.");
        expect(session(world).turn).toBe(0);
        expect(world.player.hp).toBe(30);
    });
});
