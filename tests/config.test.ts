/*
 *  config.test.ts — Tests for world option parsing
 *  hearthlight
 */

import { describe, it, expect } from "vitest";
import { buildWorldOptions, parseWorldOptions } from "../src/utils/config.js";
import { ConfigError, GenerationError, HearthlightError } from "../src/utils/errors.js";

describe("parseWorldOptions", () => {
    it("applies default dimensions", () => {
        expect(parseWorldOptions({ seed: 42 })).toEqual({ seed: 42n, width: 80, height: 45 });
    });

    it("coerces strings", () => {
        expect(parseWorldOptions({ seed: "18446744073709551615", width: "30", height: "20" })).toEqual({
            seed: 18446744073709551615n,
            width: 30,
            height: 20,
        });
    });

    it("rejects seeds outside 64 bits", () => {
        expect(() => parseWorldOptions({ seed: -1n })).toThrow(ConfigError);
        expect(() => parseWorldOptions({ seed: 2n ** 64n })).toThrow(ConfigError);
    });

    it("rejects maps too small to hold a room", () => {
        expect(() => parseWorldOptions({ seed: 1, width: 16 })).toThrow(ConfigError);
        expect(() => parseWorldOptions({ seed: 1, height: 14 })).toThrow(ConfigError);
    });

    it("reports each failing field", () => {
        try {
            parseWorldOptions({ seed: 1, width: 3.5 });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.code).toBe("CONFIG_ERROR");
                expect(error.name).toBe("ConfigError");
                expect(error.message).toMatch(/^Invalid world options: width /);
            }
        }
    });
});

describe("buildWorldOptions", () => {
    it("reads the environment", () => {
        const env = { HEARTHLIGHT_SEED: "7", HEARTHLIGHT_WIDTH: "40", HEARTHLIGHT_HEIGHT: "25" };
        expect(buildWorldOptions(env, 0n)).toEqual({ seed: 7n, width: 40, height: 25 });
    });

    it("falls back to the given seed and defaults", () => {
        expect(buildWorldOptions({}, 99n)).toEqual({ seed: 99n, width: 80, height: 45 });
    });
});

describe("errors", () => {
    it("carry codes and details", () => {
        const error = new GenerationError("no floor", { depth: 1 });
        expect(error).toBeInstanceOf(HearthlightError);
        expect(error.code).toBe("GENERATION_ERROR");
        expect(error.details).toEqual({ depth: 1 });
    });
});
