/*
 *  constants.ts — Tunable numbers for generation, inventory and combat
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== World =====

export const LEVEL_COUNT = 2;
export const DEFAULT_MAP_WIDTH = 80;
export const DEFAULT_MAP_HEIGHT = 45;

/** Smallest sizes for which the first room attempt always fits. */
export const MIN_MAP_WIDTH = 17;
export const MIN_MAP_HEIGHT = 15;
export const MAX_MAP_WIDTH = 200;
export const MAX_MAP_HEIGHT = 120;

export const LOG_CAPACITY = 6;

// ===== Level generation =====

export const MAX_ROOM_ATTEMPTS = 10;
export const ROOM_MIN_WIDTH = 6;
export const ROOM_MAX_WIDTH = 12;
export const ROOM_MIN_HEIGHT = 6;
export const ROOM_MAX_HEIGHT = 10;
export const ROOM_MARGIN = 2;
export const ROOM_CLEARANCE = 2;

export const MAX_CHESTS_PER_LEVEL = 3;
export const PLACEMENT_ATTEMPTS = 200;
export const NPC_SPACING = 4;
export const NEARBY_REWARD_RADIUS = 3;

/** Offset multiplied by the level index to derive that level's seed. */
export const LEVEL_SEED_STRIDE = 9973n;
export const DOOR_SEED_SALT = 0xd00dn;
export const CHEST_SEED_SALT = 0xc4e57n;
export const NPC_SEED_SALT = 0x4e9cn;
export const LOOT_SEED_SALT = 0x1007n;
export const BATTLE_SEED_SALT = 0xba771en;

// ===== Player =====

export const PLAYER_BASE_HP = 30;
export const PLAYER_BASE_ATTACK = 5;
export const PLAYER_BASE_DEFENSE = 2;
export const PLAYER_BASE_SPEED = 5;

export const CONSUMABLE_CAP = 10;
export const BUFF_DURATION_MS = 30_000;

// ===== Battle =====

/** Damage is attack × DAMAGE_NUMERATOR / DAMAGE_DENOMINATOR, floored. */
export const DAMAGE_NUMERATOR = 12;
export const DAMAGE_DENOMINATOR = 10;
/** Deflect percent per point of defense: (defense / 10) × 0.2 = defense × 2%. */
export const DEFLECT_PERCENT_PER_DEFENSE = 2;
export const FLEE_PERCENT = 50;
export const SLOW_DECISION_MS = 10_000;
