/*
 *  grid.ts — Tile map storage, bounds and walkability queries
 *  hearthlight
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Pos, TileMap } from "../types/types.js";
import { Tile } from "../types/enums.js";

/**
 * Eight neighbours in fixed scan order: the row above left to right, then
 * left and right, then the row below. Door arrival and reward placement
 * both depend on this order.
 */
export const nbDirs: readonly (readonly [number, number])[] = [
    [-1, -1], [0, -1], [1, -1],
    [-1, 0], [1, 0],
    [-1, 1], [0, 1], [1, 1],
];

// =============================================================================
// Allocation and access
// =============================================================================

export function createTileMap(width: number, height: number, fill: Tile): TileMap {
    return {
        width,
        height,
        tiles: new Array<Tile>(width * height).fill(fill),
    };
}

export function tileIndex(map: TileMap, x: number, y: number): number {
    return y * map.width + x;
}

export function inBounds(map: TileMap, x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < map.width && y < map.height;
}

/** Out-of-bounds reads return Wall. */
export function getTile(map: TileMap, x: number, y: number): Tile {
    if (!inBounds(map, x, y)) {
        return Tile.Wall;
    }
    return map.tiles[tileIndex(map, x, y)];
}

/** Out-of-bounds writes are ignored. */
export function setTile(map: TileMap, x: number, y: number, tile: Tile): void {
    if (inBounds(map, x, y)) {
        map.tiles[tileIndex(map, x, y)] = tile;
    }
}

/**
 * Floor and Chest tiles can be stood on. Doors are interaction targets,
 * never walked through.
 */
export function isWalkable(map: TileMap, x: number, y: number): boolean {
    const tile = getTile(map, x, y);
    return tile === Tile.Floor || tile === Tile.Chest;
}

// =============================================================================
// Scans
// =============================================================================

/** First Floor tile in row-major order, or null for a map without floor. */
export function findFirstFloor(map: TileMap): Pos | null {
    for (let y = 0; y < map.height; y++) {
        for (let x = 0; x < map.width; x++) {
            if (map.tiles[tileIndex(map, x, y)] === Tile.Floor) {
                return { x, y };
            }
        }
    }
    return null;
}

/** All Floor tiles in row-major order, minus any excluded position. */
export function floorTiles(map: TileMap, excluded: readonly Pos[] = []): Pos[] {
    const result: Pos[] = [];
    for (let y = 0; y < map.height; y++) {
        for (let x = 0; x < map.width; x++) {
            if (map.tiles[tileIndex(map, x, y)] !== Tile.Floor) continue;
            if (excluded.some((p) => p.x === x && p.y === y)) continue;
            result.push({ x, y });
        }
    }
    return result;
}

export function countTiles(map: TileMap, tile: Tile): number {
    let count = 0;
    for (const t of map.tiles) {
        if (t === tile) count++;
    }
    return count;
}

/**
 * Number of walkable cells reachable from `from` moving in all eight
 * directions. Iterative flood fill; returns 0 if `from` is not walkable.
 */
export function reachableCells(map: TileMap, from: Pos): number {
    if (!isWalkable(map, from.x, from.y)) {
        return 0;
    }
    const seen = new Uint8Array(map.width * map.height);
    const stack: Pos[] = [from];
    seen[tileIndex(map, from.x, from.y)] = 1;
    let count = 0;

    while (stack.length > 0) {
        const cell = stack.pop();
        if (cell === undefined) break;
        count++;
        for (const [dx, dy] of nbDirs) {
            const nx = cell.x + dx;
            const ny = cell.y + dy;
            if (!isWalkable(map, nx, ny)) continue;
            const i = tileIndex(map, nx, ny);
            if (seen[i]) continue;
            seen[i] = 1;
            stack.push({ x: nx, y: ny });
        }
    }
    return count;
}

// =============================================================================
// Positions
// =============================================================================

export function posEquals(a: Pos, b: Pos): boolean {
    return a.x === b.x && a.y === b.y;
}

export function chebyshevDistance(a: Pos, b: Pos): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/** True for the eight surrounding cells (not the cell itself). */
export function isAdjacent(a: Pos, b: Pos): boolean {
    return chebyshevDistance(a, b) === 1;
}
