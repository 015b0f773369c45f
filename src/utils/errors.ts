/*
 *  errors.ts — Error types raised while building a world
 *  hearthlight
 *
 *  Player input never throws; these only surface from world creation.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

export class HearthlightError extends Error {
    code = "HEARTHLIGHT_ERROR";
    details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = new.target.name;
        this.details = details;
    }
}

export class ConfigError extends HearthlightError {
    override code = "CONFIG_ERROR";
}

export class GenerationError extends HearthlightError {
    override code = "GENERATION_ERROR";
}
