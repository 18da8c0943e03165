/**
 * Stream Connection - byte-stream I/O for tasks
 *
 * Wraps a Node Duplex (net.Socket, PassThrough, ...) so that a read or write
 * that would block turns into a wait-readable/wait-writable suspension
 * instead of a callback.
 */

import type { Duplex } from 'stream';
import type { Scheduler } from '../core/scheduler.js';
import type { Descriptor, Op } from '../core/suspension.js';
import type { StreamMultiplexer } from '../multiplexer/stream-multiplexer.js';

const WOULD_BLOCK: unique symbol = Symbol('cooploop.wouldBlock');

export class StreamConnection {
    readonly fd: Descriptor;
    private failure: Error | undefined;
    private closed = false;

    constructor(
        private readonly scheduler: Scheduler,
        private readonly multiplexer: StreamMultiplexer,
        private readonly stream: Duplex
    ) {
        this.fd = multiplexer.register(stream);
        stream.on('error', (error: Error) => {
            this.failure = error;
        });
    }

    get error(): Error | undefined {
        return this.failure;
    }

    /**
     * Read up to `maxBytes` (at least 1); an empty buffer means the peer ended the stream
     */
    *recv(maxBytes: number, timeoutMs?: number): Op<Buffer> {
        if (!(maxBytes >= 1)) {
            throw new RangeError(`recv() needs maxBytes >= 1, got ${maxBytes}`);
        }
        while (true) {
            const chunk = this.tryRead(maxBytes);
            if (chunk !== WOULD_BLOCK) {
                return chunk;
            }
            yield* this.scheduler.readable(this.fd, timeoutMs);
        }
    }

    /**
     * Write once the stream has room; returns the number of bytes accepted
     */
    *send(data: Buffer | string, timeoutMs?: number): Op<number> {
        const chunk = typeof data === 'string' ? Buffer.from(data) : data;
        while (this.stream.writableNeedDrain) {
            this.throwIfFailed();
            yield* this.scheduler.writable(this.fd, timeoutMs);
        }
        this.throwIfFailed();
        this.stream.write(chunk);
        return chunk.length;
    }

    /**
     * Write and then wait until the stream has flushed its backlog
     */
    *sendAll(data: Buffer | string, timeoutMs?: number): Op<number> {
        const written = yield* this.send(data, timeoutMs);
        while (this.stream.writableNeedDrain) {
            this.throwIfFailed();
            yield* this.scheduler.writable(this.fd, timeoutMs);
        }
        return written;
    }

    /**
     * End the writable side and stop tracking the descriptor
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.stream.end();
        this.multiplexer.unregister(this.fd);
    }

    private tryRead(maxBytes: number): Buffer | typeof WOULD_BLOCK {
        this.throwIfFailed();
        const chunk: unknown = this.stream.read();

        if (chunk === null) {
            return this.stream.readableEnded || this.stream.destroyed ? Buffer.alloc(0) : WOULD_BLOCK;
        }

        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        if (buffer.length > maxBytes) {
            this.stream.unshift(buffer.subarray(maxBytes));
            return buffer.subarray(0, maxBytes);
        }
        return buffer;
    }

    private throwIfFailed(): void {
        if (this.failure !== undefined) {
            throw this.failure;
        }
    }
}
