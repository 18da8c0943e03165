/**
 * Multiplexer Module - readiness sources for the scheduler
 */

export { type Multiplexer, type PollResult, emptyPollResult } from './types.js';
export { StreamMultiplexer, MAX_TIMER_DELAY_MS, timerDelay, type PollableStream } from './stream-multiplexer.js';
export { VirtualMultiplexer } from './virtual-multiplexer.js';
