/**
 * Readiness Multiplexer contract
 */

import type { Descriptor } from '../core/suspension.js';

export interface PollResult {
    readable: Set<Descriptor>;
    writable: Set<Descriptor>;
}

export interface Multiplexer {
    /**
     * Resolve once any listed descriptor is ready or the timeout elapses.
     * `0` returns as soon as the check is done, yielding to the host event
     * loop at most once; `null` waits until readiness or wakeup().
     */
    poll(
        read: ReadonlySet<Descriptor>,
        write: ReadonlySet<Descriptor>,
        timeoutMs: number | null
    ): Promise<PollResult>;

    /**
     * Make an in-flight poll return early (work arrived from outside a step)
     */
    wakeup(): void;
}

export function emptyPollResult(): PollResult {
    return { readable: new Set(), writable: new Set() };
}
