/**
 * Stream Multiplexer - readiness polling over Node streams
 *
 * Features:
 * - Registers Readable/Writable/Duplex streams as numeric descriptors
 * - Level check first (buffered bytes, pending drain, end, destroy)
 * - Otherwise races stream events against the timeout and wakeup() with RxJS
 * - A zero timeout still waits one timer turn, so Node gets to deliver I/O
 */

import { Subject, firstValueFrom, fromEvent, merge, timer, type Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import type { Readable, Writable } from 'stream';
import type { Descriptor } from '../core/suspension.js';
import { emptyPollResult, type Multiplexer, type PollResult } from './types.js';

export type PollableStream = Readable | Writable;

type Signal =
    | { kind: 'io'; fd: Descriptor; direction: 'read' | 'write' }
    | { kind: 'timeout' }
    | { kind: 'wakeup' };

const READ_EVENTS = ['readable', 'end', 'close', 'error'] as const;
const WRITE_EVENTS = ['drain', 'close', 'error'] as const;

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 0x7fffffff;

export function timerDelay(timeoutMs: number): number {
    return Math.min(Math.max(0, timeoutMs), MAX_TIMER_DELAY_MS);
}

function isReadable(stream: PollableStream): stream is Readable {
    return 'read' in stream && typeof stream.read === 'function';
}

function isWritable(stream: PollableStream): stream is Writable {
    return 'write' in stream && typeof stream.write === 'function';
}

export class StreamMultiplexer implements Multiplexer {
    private streams: Map<Descriptor, PollableStream> = new Map();
    private nextFd: Descriptor = 3;
    private wakeups = new Subject<void>();

    /**
     * Start tracking a stream; the returned descriptor is what tasks wait on
     */
    register(stream: PollableStream): Descriptor {
        const fd = this.nextFd++;
        this.streams.set(fd, stream);
        return fd;
    }

    unregister(fd: Descriptor): boolean {
        return this.streams.delete(fd);
    }

    get size(): number {
        return this.streams.size;
    }

    async poll(
        read: ReadonlySet<Descriptor>,
        write: ReadonlySet<Descriptor>,
        timeoutMs: number | null
    ): Promise<PollResult> {
        const ready = this.collectReady(read, write);
        if (ready.readable.size > 0 || ready.writable.size > 0) {
            return ready;
        }

        const sources: Array<Observable<Signal>> = [
            this.wakeups.pipe(map((): Signal => ({ kind: 'wakeup' }))),
        ];
        for (const fd of read) {
            const stream = this.streams.get(fd);
            if (stream === undefined) continue;
            for (const event of READ_EVENTS) {
                sources.push(fromEvent(stream, event).pipe(
                    map((): Signal => ({ kind: 'io', fd, direction: 'read' }))
                ));
            }
        }
        for (const fd of write) {
            const stream = this.streams.get(fd);
            if (stream === undefined) continue;
            for (const event of WRITE_EVENTS) {
                sources.push(fromEvent(stream, event).pipe(
                    map((): Signal => ({ kind: 'io', fd, direction: 'write' }))
                ));
            }
        }
        if (timeoutMs !== null) {
            // A capped delay returns early; the run loop polls again for the remainder
            sources.push(timer(timerDelay(timeoutMs)).pipe(map((): Signal => ({ kind: 'timeout' }))));
        }

        const signal = await firstValueFrom(merge(...sources));

        const result = this.collectReady(read, write);
        // Edge-triggered fallback: report the descriptor whose event fired even
        // when the level check cannot see it yet; callers retry on would-block.
        if (signal.kind === 'io') {
            (signal.direction === 'read' ? result.readable : result.writable).add(signal.fd);
        }
        return result;
    }

    wakeup(): void {
        this.wakeups.next();
    }

    private collectReady(read: ReadonlySet<Descriptor>, write: ReadonlySet<Descriptor>): PollResult {
        const result = emptyPollResult();
        for (const fd of read) {
            const stream = this.streams.get(fd);
            if (stream !== undefined && this.readReady(stream)) {
                result.readable.add(fd);
            }
        }
        for (const fd of write) {
            const stream = this.streams.get(fd);
            if (stream !== undefined && this.writeReady(stream)) {
                result.writable.add(fd);
            }
        }
        return result;
    }

    private readReady(stream: PollableStream): boolean {
        if (stream.destroyed) return true;
        if (!isReadable(stream)) return false;
        return stream.readableLength > 0 || stream.readableEnded;
    }

    private writeReady(stream: PollableStream): boolean {
        if (stream.destroyed) return true;
        if (!isWritable(stream)) return false;
        return !stream.writableNeedDrain;
    }
}
