/*
 *  actions.ts — Player actions consumed by the world controller
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { ActionKind, type BattleOption } from "./enums.js";

export type Step = -1 | 0 | 1;

export type Action =
    | { kind: ActionKind.Move; dx: Step; dy: Step }
    | { kind: ActionKind.ToggleInventory }
    | { kind: ActionKind.InventoryUp }
    | { kind: ActionKind.InventoryDown }
    | { kind: ActionKind.UseConsumable }
    | { kind: ActionKind.ToggleStats }
    | { kind: ActionKind.ToggleInvTab }
    | { kind: ActionKind.Confirm }
    | { kind: ActionKind.Interact }
    | { kind: ActionKind.Choice; key: string }
    | { kind: ActionKind.BattleOption; option: BattleOption; penalty: boolean }
    | { kind: ActionKind.Quit }
    | { kind: ActionKind.None };

// Convenience constructors for input loops and tests.

export const move = (dx: Step, dy: Step): Action => ({ kind: ActionKind.Move, dx, dy });
export const choice = (key: string): Action => ({ kind: ActionKind.Choice, key });
export const battleOption = (option: BattleOption, penalty = false): Action =>
    ({ kind: ActionKind.BattleOption, option, penalty });

export const TOGGLE_INVENTORY: Action = { kind: ActionKind.ToggleInventory };
export const INVENTORY_UP: Action = { kind: ActionKind.InventoryUp };
export const INVENTORY_DOWN: Action = { kind: ActionKind.InventoryDown };
export const USE_CONSUMABLE: Action = { kind: ActionKind.UseConsumable };
export const TOGGLE_STATS: Action = { kind: ActionKind.ToggleStats };
export const TOGGLE_INV_TAB: Action = { kind: ActionKind.ToggleInvTab };
export const CONFIRM: Action = { kind: ActionKind.Confirm };
export const INTERACT: Action = { kind: ActionKind.Interact };
export const QUIT: Action = { kind: ActionKind.Quit };
export const NO_ACTION: Action = { kind: ActionKind.None };
