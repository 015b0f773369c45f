/*
 *  architect/index.ts — Barrel export for level generation
 *  hearthlight
 */

export {
    type Rect,
    type RoomLayout,
    rectCenter,
    rectsIntersect,
    inflateRect,
    carveRoom,
    carveHorizontalCorridor,
    carveVerticalCorridor,
    connectRooms,
    generateRoomsAndCorridors,
} from "./rooms.js";

export {
    chooseFreeTile,
    placeDoor,
    scatterChests,
    levelSeed,
    buildLevel,
} from "./level.js";
