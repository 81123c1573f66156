/**
 * Small seeded PRNG (mulberry32). Deterministic for a given seed, which keeps
 * clustering results reproducible across runs.
 */
export class SeededRandom {
    private state: number;

    constructor(seed = 42) {
        this.state = seed >>> 0;
    }

    /** Uniform float in [0, 1). */
    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform float in [min, max). */
    uniform(min: number, max: number): number {
        return min + (max - min) * this.next();
    }

    /** Uniform integer in [0, n). */
    int(n: number): number {
        return Math.floor(this.next() * n);
    }

    choice<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new RangeError('Cannot choose from an empty list');
        }
        return items[this.int(items.length)];
    }
}
