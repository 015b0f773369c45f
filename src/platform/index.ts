/*
 *  platform/index.ts — Barrel exports for the platform module
 *  hearthlight
 */

export type { Clock, Logger } from "../types/platform.js";

export { systemClock, createManualClock, type ManualClock } from "./clock.js";
export { consoleLogger, nullLogger } from "./logger.js";
