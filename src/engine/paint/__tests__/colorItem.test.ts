import { describe, it, expect } from 'vitest';
import { SeededRNG } from '../../../lib/rng.js';
import { sampleColor, type ColorItem } from '../colorItem.js';

describe('sampleColor', () => {
    const shade = { r: 120, g: 60, b: 200 };
    const theme = { r: 0, g: 255, b: 0 };

    it('returns the shade itself without deviation or weight', () => {
        const item: ColorItem = { shade, deviation: 0, theme, weight: 0 };
        const rng = new SeededRNG(3);
        for (let i = 0; i < 20; i++) {
            expect(sampleColor(item, rng)).toEqual(shade);
        }
    });

    it('varies each channel by at most the deviation', () => {
        const item: ColorItem = { shade, deviation: 10, theme, weight: 0 };
        const rng = new SeededRNG(4);
        let distinct = false;
        for (let i = 0; i < 200; i++) {
            const c = sampleColor(item, rng);
            expect(Math.abs(c.r - shade.r)).toBeLessThanOrEqual(10);
            expect(Math.abs(c.g - shade.g)).toBeLessThanOrEqual(10);
            expect(Math.abs(c.b - shade.b)).toBeLessThanOrEqual(10);
            if (c.r !== shade.r || c.g !== shade.g || c.b !== shade.b) distinct = true;
        }
        expect(distinct).toBe(true);
    });

    it('approaches the theme as the weight grows', () => {
        const item: ColorItem = { shade, deviation: 0, theme, weight: 1_000_000 };
        expect(sampleColor(item, new SeededRNG(1))).toEqual(theme);
    });

    it('blends halfway at weight 100', () => {
        const item: ColorItem = { shade, deviation: 0, theme, weight: 100 };
        expect(sampleColor(item, new SeededRNG(1))).toEqual({ r: 60, g: 158, b: 100 });
    });
});
