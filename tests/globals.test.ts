/*
 *  globals.test.ts — Tests for item, NPC and dialogue catalogs
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import { EquipSlot, NpcId, QuestFlag, RewardPlacement } from "../src/types/enums.js";
import { createRandomStream } from "../src/math/rng.js";
import {
    consumableCatalog, equipmentCatalog, makeConsumable, makeEquipment, rollChestContents,
} from "../src/globals/item-catalog.js";
import { npcCatalog, npcDefinition } from "../src/globals/npc-catalog.js";
import { dialogueCatalog } from "../src/globals/dialogue-catalog.js";

describe("item catalog", () => {
    it("hands out copies, not the frozen templates", () => {
        const apple = makeConsumable("apple");
        apple.heal = 99;
        expect(consumableCatalog.apple.heal).toBe(5);
        const sword = makeEquipment("ironSword");
        expect(sword).toEqual({ name: "Iron Sword", slot: EquipSlot.Sword, attack: 5, defense: 0, speed: 0, hp: 0 });
        expect(Object.isFrozen(equipmentCatalog.ironSword)).toBe(true);
    });

    it("fills the first two Room 1 chests with a sword and a shield", () => {
        const rng = createRandomStream(1n);
        expect(rollChestContents(0, 0, rng)).toEqual({
            consumable: makeConsumable("apple"),
            equipment: makeEquipment("rustySword"),
        });
        expect(rollChestContents(0, 1, rng)).toEqual({
            consumable: null,
            equipment: makeEquipment("woodenShield"),
        });
        const third = rollChestContents(0, 2, rng);
        expect(third.equipment).toBeNull();
        expect(third.consumable).not.toBeNull();
    });

    it("always puts a consumable in deeper chests", () => {
        const rng = createRandomStream(8n);
        for (let i = 0; i < 20; i++) {
            const contents = rollChestContents(1, i % 3, rng);
            expect(contents.consumable).not.toBeNull();
            if (contents.equipment) {
                expect(["Iron Sword", "Kite Shield"]).toContain(contents.equipment.name);
            }
        }
    });
});

describe("npc catalog", () => {
    it("is indexed by NpcId", () => {
        npcCatalog.forEach((definition, index) => {
            expect(definition.id).toBe(index);
        });
        expect(npcDefinition(NpcId.Warden).flag).toBe(QuestFlag.WardenDefeated);
    });

    it("gives combat stats only to fighters", () => {
        expect(npcDefinition(NpcId.Guide).enemy).toBeNull();
        expect(npcDefinition(NpcId.Hermit).enemy).toBeNull();
        expect(npcDefinition(NpcId.Bandit).enemy).toEqual({ hp: 18, attack: 4, defense: 2, speed: 4 });
        expect(npcDefinition(NpcId.Warden).level).toBe(1);
    });
});

describe("dialogue catalog", () => {
    it("has a script for every identity with fighters carrying battles", () => {
        for (const definition of npcCatalog) {
            const script = dialogueCatalog[definition.id];
            expect(script.firstPages.length).toBeGreaterThan(0);
            expect(script.laterPages.length).toBeGreaterThan(0);
            expect(script.battle !== null).toBe(definition.enemy !== null);
        }
    });

    it("puts every choice on an existing page", () => {
        for (const definition of npcCatalog) {
            const { choice, firstPages } = dialogueCatalog[definition.id];
            if (choice) {
                expect(choice.page).toBeLessThan(firstPages.length);
            }
        }
    });

    it("lets the Bandit be fled from but not the Warden", () => {
        expect(dialogueCatalog[NpcId.Bandit].battle?.playerInitiated).toBe(false);
        expect(dialogueCatalog[NpcId.Warden].battle?.playerInitiated).toBe(true);
        expect(dialogueCatalog[NpcId.Warden].battle?.placement).toBe(RewardPlacement.Adjacent);
        expect(dialogueCatalog[NpcId.Warden].battle?.rewards).toHaveLength(2);
    });
});
