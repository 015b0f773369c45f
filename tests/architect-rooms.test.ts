/*
 *  architect-rooms.test.ts — Tests for room placement and corridor carving
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import { Tile } from "../src/types/enums.js";
import { createTileMap, getTile, countTiles, reachableCells } from "../src/grid/grid.js";
import { createRandomStream } from "../src/math/rng.js";
import {
    rectCenter, rectsIntersect, inflateRect, carveRoom,
    carveHorizontalCorridor, carveVerticalCorridor, generateRoomsAndCorridors,
} from "../src/architect/rooms.js";

describe("rectangles", () => {
    it("centres on the floor of the midpoint", () => {
        expect(rectCenter({ x1: 2, y1: 3, x2: 9, y2: 8 })).toEqual({ x: 5, y: 5 });
    });

    it("detects overlap on inclusive corners", () => {
        const a = { x1: 0, y1: 0, x2: 4, y2: 4 };
        expect(rectsIntersect(a, { x1: 4, y1: 4, x2: 6, y2: 6 })).toBe(true);
        expect(rectsIntersect(a, { x1: 5, y1: 0, x2: 6, y2: 4 })).toBe(false);
    });

    it("inflates within the map", () => {
        expect(inflateRect({ x1: 1, y1: 1, x2: 3, y2: 3 }, 2, 5, 5)).toEqual({ x1: 0, y1: 0, x2: 4, y2: 4 });
    });
});

describe("carving", () => {
    it("carves a room inclusively", () => {
        const map = createTileMap(10, 10, Tile.Wall);
        carveRoom(map, { x1: 2, y1: 2, x2: 4, y2: 3 });
        expect(countTiles(map, Tile.Floor)).toBe(6);
    });

    it("carves corridors two tiles wide", () => {
        const map = createTileMap(10, 10, Tile.Wall);
        carveHorizontalCorridor(map, 6, 2, 4);
        expect(countTiles(map, Tile.Floor)).toBe(10);
        expect(getTile(map, 2, 5)).toBe(Tile.Floor);

        const other = createTileMap(10, 10, Tile.Wall);
        carveVerticalCorridor(other, 1, 3, 7);
        expect(countTiles(other, Tile.Floor)).toBe(6);
        expect(getTile(other, 8, 3)).toBe(Tile.Floor);
    });
});

describe("generateRoomsAndCorridors", () => {
    it("is reproducible for the same seed and size", () => {
        const a = generateRoomsAndCorridors(80, 45, createRandomStream(42n));
        const b = generateRoomsAndCorridors(80, 45, createRandomStream(42n));
        expect(a.map.tiles).toEqual(b.map.tiles);
        expect(a.rooms).toEqual(b.rooms);
    });

    it("places separated rooms inside the margin", () => {
        const { rooms } = generateRoomsAndCorridors(80, 45, createRandomStream(42n));
        expect(rooms.length).toBeGreaterThanOrEqual(1);
        for (const r of rooms) {
            expect(r.x1).toBeGreaterThanOrEqual(2);
            expect(r.y1).toBeGreaterThanOrEqual(2);
            expect(r.x2).toBeLessThanOrEqual(77);
            expect(r.y2).toBeLessThanOrEqual(42);
        }
        for (let i = 0; i < rooms.length; i++) {
            for (let j = i + 1; j < rooms.length; j++) {
                expect(rectsIntersect(rooms[j], inflateRect(rooms[i], 2, 80, 45))).toBe(false);
            }
        }
    });

    it("connects every floor tile", () => {
        for (const seed of [1n, 42n, 1234n]) {
            const { map, rooms } = generateRoomsAndCorridors(80, 45, createRandomStream(seed));
            const start = rectCenter(rooms[0]);
            expect(reachableCells(map, start)).toBe(countTiles(map, Tile.Floor));
        }
    });

    it("always fits one room on the smallest map", () => {
        const { rooms } = generateRoomsAndCorridors(17, 15, createRandomStream(5n));
        expect(rooms.length).toBeGreaterThanOrEqual(1);
    });
});
