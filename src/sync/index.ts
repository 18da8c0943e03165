/**
 * Synchronization primitives built on the scheduler's park/unpark contract
 */

export { AsyncQueue } from './async-queue.js';
