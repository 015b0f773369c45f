/*
 *  io-messages.ts — Bounded message log
 *  hearthlight
 *
 *  A fixed-size ring buffer. When full, the oldest entry is overwritten.
 *  A message identical to the most recent one bumps that entry's repeat
 *  count instead of taking a new slot.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { LOG_CAPACITY } from "../types/constants.js";

// =============================================================================
// Types
// =============================================================================

export interface ArchivedMessage {
    message: string;
    /** How many times in a row this message was logged. */
    count: number;
}

export interface MessageLog {
    /** Ring buffer. Empty slots have an empty message. */
    archive: ArchivedMessage[];
    /** Next write slot. */
    archivePosition: number;
    capacity: number;
}

const MAX_MESSAGE_REPEATS = 100;

// =============================================================================
// State construction
// =============================================================================

export function createMessageLog(capacity = LOG_CAPACITY): MessageLog {
    const archive: ArchivedMessage[] = [];
    for (let i = 0; i < capacity; i++) {
        archive.push({ message: "", count: 0 });
    }
    return { archive, archivePosition: 0, capacity };
}

// =============================================================================
// Archive logic
// =============================================================================

/**
 * The entry `back` writes ago. 1 is the most recent; 0 is the next write
 * slot (the oldest entry once the log is full).
 */
export function getArchivedMessage(log: MessageLog, back: number): ArchivedMessage {
    return log.archive[(log.archivePosition + log.capacity - back) % log.capacity];
}

export function formatCountedMessage(m: ArchivedMessage): string {
    if (m.count <= 1) {
        return m.message;
    } else if (m.count >= MAX_MESSAGE_REPEATS) {
        return `${m.message} (many)`;
    } else {
        return `${m.message} (x${m.count})`;
    }
}

export function pushMessage(log: MessageLog, message: string): void {
    if (!message) {
        return;
    }
    const latest = getArchivedMessage(log, 1);
    if (latest.message === message) {
        latest.count++;
        return;
    }
    log.archive[log.archivePosition] = { message, count: 1 };
    log.archivePosition = (log.archivePosition + 1) % log.capacity;
}

/** Formatted messages, oldest first. */
export function recentMessages(log: MessageLog): string[] {
    const lines: string[] = [];
    for (let back = log.capacity; back >= 1; back--) {
        const m = getArchivedMessage(log, back);
        if (m.message) {
            lines.push(formatCountedMessage(m));
        }
    }
    return lines;
}

export function clearMessages(log: MessageLog): void {
    for (let i = 0; i < log.capacity; i++) {
        log.archive[i] = { message: "", count: 0 };
    }
    log.archivePosition = 0;
}
