/**
 * Virtual Multiplexer - deterministic readiness on simulated time
 *
 * Poll never waits for real: a finite timeout moves the VirtualClock forward,
 * and readiness comes from level-triggered marks that callers set directly or
 * schedule for a future virtual time.
 */

import type { VirtualClock } from '../core/clock.js';
import { DeadlockError } from '../core/errors.js';
import type { Descriptor } from '../core/suspension.js';
import { emptyPollResult, type Multiplexer, type PollResult } from './types.js';

interface ScheduledMark {
    at: number;
    fd: Descriptor;
    direction: 'read' | 'write';
}

export class VirtualMultiplexer implements Multiplexer {
    private readableFds: Set<Descriptor> = new Set();
    private writableFds: Set<Descriptor> = new Set();
    private scheduled: ScheduledMark[] = [];
    private pollCount = 0;

    constructor(readonly clock: VirtualClock) {}

    get polls(): number {
        return this.pollCount;
    }

    setReadable(fd: Descriptor, ready: boolean = true): void {
        if (ready) this.readableFds.add(fd);
        else this.readableFds.delete(fd);
    }

    setWritable(fd: Descriptor, ready: boolean = true): void {
        if (ready) this.writableFds.add(fd);
        else this.writableFds.delete(fd);
    }

    /**
     * Mark `fd` readable once the virtual clock reaches `at`
     */
    readableAt(fd: Descriptor, at: number): void {
        this.schedule({ at, fd, direction: 'read' });
    }

    writableAt(fd: Descriptor, at: number): void {
        this.schedule({ at, fd, direction: 'write' });
    }

    async poll(
        read: ReadonlySet<Descriptor>,
        write: ReadonlySet<Descriptor>,
        timeoutMs: number | null
    ): Promise<PollResult> {
        this.pollCount++;
        this.applyDue();

        let result = this.collect(read, write);
        if (result.readable.size > 0 || result.writable.size > 0 || timeoutMs === 0) {
            return result;
        }

        const limit = timeoutMs === null ? Infinity : this.clock.now() + timeoutMs;

        // Walk scheduled marks until one is for a descriptor somebody waits on
        let next = this.scheduled[0];
        while (next !== undefined && next.at <= limit) {
            this.clock.advanceTo(next.at);
            this.applyDue();
            result = this.collect(read, write);
            if (result.readable.size > 0 || result.writable.size > 0) {
                return result;
            }
            next = this.scheduled[0];
        }

        if (timeoutMs === null) {
            throw new DeadlockError();
        }
        this.clock.advanceTo(limit);
        return result;
    }

    wakeup(): void {
        // poll() never blocks, so there is nothing to interrupt
    }

    private schedule(mark: ScheduledMark): void {
        const idx = this.scheduled.findIndex(m => m.at > mark.at);
        if (idx === -1) {
            this.scheduled.push(mark);
        } else {
            this.scheduled.splice(idx, 0, mark);
        }
    }

    private applyDue(): void {
        const now = this.clock.now();
        while (this.scheduled.length > 0 && (this.scheduled[0]?.at ?? Infinity) <= now) {
            const mark = this.scheduled.shift();
            if (mark === undefined) break;
            if (mark.direction === 'read') this.readableFds.add(mark.fd);
            else this.writableFds.add(mark.fd);
        }
    }

    private collect(read: ReadonlySet<Descriptor>, write: ReadonlySet<Descriptor>): PollResult {
        const result = emptyPollResult();
        for (const fd of read) {
            if (this.readableFds.has(fd)) result.readable.add(fd);
        }
        for (const fd of write) {
            if (this.writableFds.has(fd)) result.writable.add(fd);
        }
        return result;
    }
}
