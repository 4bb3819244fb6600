import type { RandomSource } from "../lib/rng.js";

/**
 * Weighted random choice among a fixed set of items
 */
export class Chooser<T> {
    private readonly items: [T, number][] = [];
    private total = 0;

    constructor(entries: Iterable<readonly [T, number]> = []) {
        for (const [item, weight] of entries) {
            this.push(item, weight);
        }
    }

    /**
     * Items with a non-positive weight are never chosen and are not stored
     */
    push(item: T, weight: number): void {
        const w = Math.floor(weight);
        if (w <= 0) return;
        this.items.push([item, w]);
        this.total += w;
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    choose(rng: RandomSource): T | undefined {
        if (this.total === 0) return undefined;
        let ticket = rng.randomInt(0, this.total);
        for (const [item, weight] of this.items) {
            if (ticket < weight) return item;
            ticket -= weight;
        }
        return undefined;
    }
}
