/**
 * Seeded pseudo-random number source
 * Every operation that needs randomness receives one of these explicitly;
 * there is no module-level generator.
 */

export interface RandomSource {
    /** Uniform float in [0, 1) */
    random(): number;
    /** Uniform integer in [min, max) */
    randomInt(min: number, max: number): number;
    /** Uniform pick, undefined for an empty list */
    choose<T>(items: readonly T[]): T | undefined;
}

/**
 * Linear congruential generator (Numerical Recipes parameters)
 */
export class SeededRNG implements RandomSource {
    private seed: number;

    constructor(seed: number = Date.now()) {
        // Ensure seed is a positive 32-bit integer
        this.seed = Math.floor(Math.abs(seed)) % 0x100000000 || 1;
    }

    random(): number {
        this.seed = (Math.imul(this.seed, 1664525) + 1013904223) >>> 0;
        return this.seed / 0x100000000;
    }

    randomInt(min: number, max: number): number {
        if (max <= min) return min;
        return Math.floor(this.random() * (max - min)) + min;
    }

    choose<T>(items: readonly T[]): T | undefined {
        if (items.length === 0) return undefined;
        return items[this.randomInt(0, items.length)];
    }
}
