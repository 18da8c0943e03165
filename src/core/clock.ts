/**
 * Clocks used for all deadline math (milliseconds, monotonic)
 */

import { performance } from 'perf_hooks';

export interface Clock {
    now(): number;
}

/**
 * Process-monotonic clock, immune to wall-clock adjustment
 */
export const monotonicClock: Clock = {
    now: () => performance.now(),
};

/**
 * Clock that only moves when told to
 */
export class VirtualClock implements Clock {
    private current: number;

    constructor(start: number = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    advance(ms: number): void {
        if (ms < 0) {
            throw new RangeError(`Cannot move a clock backwards (${ms}ms)`);
        }
        this.current += ms;
    }

    /**
     * Jump to an absolute time; earlier times are ignored
     */
    advanceTo(time: number): void {
        if (time > this.current) {
            this.current = time;
        }
    }
}
