/*
 *  combat/index.ts — Barrel export for combat module
 *  hearthlight
 */

export {
    computeDamage,
    deflectChance,
    attackDeflected,
    playerActsFirst,
    isSlowBattleDecision,
} from "./combat-math.js";

export {
    activeBattle,
    startBattle,
    resolveBattleOption,
    openBattleInventory,
    useConsumableInBattle,
} from "./combat-battle.js";
