/*
 *  rooms.ts — Room placement and two-lane corridor carving
 *  hearthlight
 *
 *  Rooms are rejection-sampled rectangles kept apart by a clearance
 *  buffer. Each new room is joined to the previous one by an L-shaped
 *  corridor pair, two tiles wide, so no corridor is a single-file
 *  dead end.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { Pos, TileMap } from "../types/types.js";
import { Tile } from "../types/enums.js";
import {
    MAX_ROOM_ATTEMPTS, ROOM_MIN_WIDTH, ROOM_MAX_WIDTH,
    ROOM_MIN_HEIGHT, ROOM_MAX_HEIGHT, ROOM_MARGIN, ROOM_CLEARANCE,
} from "../types/constants.js";
import { createTileMap, setTile } from "../grid/grid.js";
import type { RandomStream } from "../math/rng.js";

// =============================================================================
// Rectangles
// =============================================================================

/** Inclusive corners. A room covers x1..x2 × y1..y2. */
export interface Rect {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
}

export function rectCenter(r: Rect): Pos {
    return {
        x: Math.floor((r.x1 + r.x2) / 2),
        y: Math.floor((r.y1 + r.y2) / 2),
    };
}

export function rectsIntersect(a: Rect, b: Rect): boolean {
    return a.x1 <= b.x2 && a.x2 >= b.x1 && a.y1 <= b.y2 && a.y2 >= b.y1;
}

/** Grow `r` by `margin` on every side, clamped to the map. */
export function inflateRect(r: Rect, margin: number, width: number, height: number): Rect {
    return {
        x1: Math.max(0, r.x1 - margin),
        y1: Math.max(0, r.y1 - margin),
        x2: Math.min(width - 1, r.x2 + margin),
        y2: Math.min(height - 1, r.y2 + margin),
    };
}

// =============================================================================
// Carving
// =============================================================================

export function carveRoom(map: TileMap, r: Rect): void {
    for (let y = r.y1; y <= r.y2; y++) {
        for (let x = r.x1; x <= r.x2; x++) {
            setTile(map, x, y, Tile.Floor);
        }
    }
}

/** Horizontal corridor on rows y and y + 1. */
export function carveHorizontalCorridor(map: TileMap, x1: number, x2: number, y: number): void {
    const start = Math.min(x1, x2);
    const end = Math.max(x1, x2);
    for (let x = start; x <= end; x++) {
        setTile(map, x, y, Tile.Floor);
        if (y + 1 < map.height) {
            setTile(map, x, y + 1, Tile.Floor);
        }
    }
}

/** Vertical corridor on columns x and x + 1. */
export function carveVerticalCorridor(map: TileMap, y1: number, y2: number, x: number): void {
    const start = Math.min(y1, y2);
    const end = Math.max(y1, y2);
    for (let y = start; y <= end; y++) {
        setTile(map, x, y, Tile.Floor);
        if (x + 1 < map.width) {
            setTile(map, x + 1, y, Tile.Floor);
        }
    }
}

/**
 * Join two points with an L: horizontal then vertical, or vertical then
 * horizontal, on a coin flip.
 */
export function connectRooms(map: TileMap, from: Pos, to: Pos, rng: RandomStream): void {
    if (rng.percent(50)) {
        carveHorizontalCorridor(map, from.x, to.x, from.y);
        carveVerticalCorridor(map, from.y, to.y, to.x);
    } else {
        carveVerticalCorridor(map, from.y, to.y, from.x);
        carveHorizontalCorridor(map, from.x, to.x, to.y);
    }
}

// =============================================================================
// Generation
// =============================================================================

export interface RoomLayout {
    map: TileMap;
    rooms: Rect[];
}

/**
 * Carve rooms and corridors into an all-wall map.
 *
 * Makes MAX_ROOM_ATTEMPTS placement attempts. A candidate that overlaps the
 * clearance buffer of an earlier room is skipped; if a sampled size cannot
 * fit the map at all, generation stops with the rooms placed so far.
 */
export function generateRoomsAndCorridors(
    width: number,
    height: number,
    rng: RandomStream,
): RoomLayout {
    const map = createTileMap(width, height, Tile.Wall);
    const rooms: Rect[] = [];

    for (let attempt = 0; attempt < MAX_ROOM_ATTEMPTS; attempt++) {
        const w = rng.range(ROOM_MIN_WIDTH, ROOM_MAX_WIDTH);
        const h = rng.range(ROOM_MIN_HEIGHT, ROOM_MAX_HEIGHT);

        if (width <= w + 2 * ROOM_MARGIN || height <= h + 2 * ROOM_MARGIN) {
            break;
        }

        const x = rng.range(ROOM_MARGIN, width - w - ROOM_MARGIN - 1);
        const y = rng.range(ROOM_MARGIN, height - h - ROOM_MARGIN - 1);
        const candidate: Rect = { x1: x, y1: y, x2: x + w, y2: y + h };

        const crowded = rooms.some((r) =>
            rectsIntersect(candidate, inflateRect(r, ROOM_CLEARANCE, width, height)));
        if (crowded) {
            continue;
        }

        carveRoom(map, candidate);

        const previous = rooms[rooms.length - 1];
        if (previous !== undefined) {
            connectRooms(map, rectCenter(previous), rectCenter(candidate), rng);
        }

        rooms.push(candidate);
    }

    return { map, rooms };
}
