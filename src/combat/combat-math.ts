/*
 *  combat-math.ts — Combat math: damage, deflection and initiative
 *  hearthlight
 *
 *  Pure calculations. Integer arithmetic throughout so results never
 *  depend on floating-point rounding.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { RandomStream } from "../math/rng.js";
import { clamp } from "../math/rng.js";
import {
    DAMAGE_NUMERATOR, DAMAGE_DENOMINATOR, DEFLECT_PERCENT_PER_DEFENSE, SLOW_DECISION_MS,
} from "../types/constants.js";

// =============================================================================
// Damage
// =============================================================================

/** floor(attack × 1.2), never negative. */
export function computeDamage(attack: number): number {
    return Math.max(0, Math.floor((attack * DAMAGE_NUMERATOR) / DAMAGE_DENOMINATOR));
}

// =============================================================================
// Deflection
// =============================================================================

/**
 * Percent chance that a defender fully negates an incoming hit:
 * (defense / 10) × 0.2, expressed as defense × 2 and capped at 100.
 */
export function deflectChance(defense: number): number {
    return clamp(defense * DEFLECT_PERCENT_PER_DEFENSE, 0, 100);
}

export function attackDeflected(rng: RandomStream, defense: number): boolean {
    return rng.percent(deflectChance(defense));
}

// =============================================================================
// Initiative
// =============================================================================

/**
 * The player moves first on a speed tie or better, unless a penalty is in
 * force this turn, in which case the enemy always moves first.
 */
export function playerActsFirst(playerSpeed: number, enemySpeed: number, penalty: boolean): boolean {
    return !penalty && playerSpeed >= enemySpeed;
}

/**
 * For the input loop: true when the player took longer than the allowed
 * decision time, so the next battle option carries a penalty.
 */
export function isSlowBattleDecision(lastInputAt: number, now: number): boolean {
    return now - lastInputAt > SLOW_DECISION_MS;
}
