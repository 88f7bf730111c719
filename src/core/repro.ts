/**
 * @module core/repro
 * @description Seeded randomness for reproducible channel simulation and tests
 */

/**
 * Mulberry32 generator over a 32-bit state
 *
 * A channel run driven by one seed flips the same positions every time.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /** Uniform float in [0, 1) */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform integer in [min, max) */
    randint(min: number, max: number): number {
        return min + Math.floor(this.random() * (max - min));
    }

    bit(): 0 | 1 {
        return this.random() < 0.5 ? 0 : 1;
    }

    bits(length: number): Array<0 | 1> {
        return Array.from({ length }, () => this.bit());
    }

    /**
     * `count` distinct 1-indexed positions out of 1..length, ascending
     *
     * Partial Fisher-Yates over the candidate positions; count is clamped
     * to length.
     */
    choosePositions(length: number, count: number): number[] {
        const pool = Array.from({ length }, (_, i) => i + 1);
        const take = Math.max(0, Math.min(count, length));
        for (let i = 0; i < take; i++) {
            const j = this.randint(i, length);
            [pool[i], pool[j]] = [pool[j], pool[i]];
        }
        return pool.slice(0, take).sort((a, b) => a - b);
    }

    /** Current state, for replaying from a point mid-run */
    getState(): number {
        return this.state;
    }

    setState(state: number): void {
        this.state = state >>> 0;
    }
}

export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
