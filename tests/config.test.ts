import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
    ConfigError,
    defaultConfig,
    loadConfig,
    validateConfig,
} from '../src/config/index.js';
import { Scheduler } from '../src/core/scheduler.js';
import { VirtualClock } from '../src/core/clock.js';
import { VirtualMultiplexer } from '../src/multiplexer/virtual-multiplexer.js';
import { silentLogger } from '../src/logging/logger.js';

describe('config', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'cooploop-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function writeJson(name: string, content: string): string {
        const path = join(dir, name);
        writeFileSync(path, content);
        return path;
    }

    it('has defaults', () => {
        expect(defaultConfig()).toEqual({
            errorPolicy: 'throw',
            maxDrainsWithoutPoll: 16,
            logLevel: 'warn',
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            env: {
                COOPLOOP_ERROR_POLICY: 'report',
                COOPLOOP_MAX_DRAINS_WITHOUT_POLL: '4',
            },
        });

        expect(config).toEqual({
            errorPolicy: 'report',
            maxDrainsWithoutPoll: 4,
            logLevel: 'warn',
        });
    });

    it('lets the environment win over the file', () => {
        const file = writeJson('config.json', JSON.stringify({ errorPolicy: 'report', logLevel: 'debug' }));

        const config = loadConfig({ file, env: { COOPLOOP_LOG_LEVEL: 'error' } });

        expect(config).toEqual({
            errorPolicy: 'report',
            maxDrainsWithoutPoll: 16,
            logLevel: 'error',
        });
    });

    it('finds the file through COOPLOOP_CONFIG', () => {
        const file = writeJson('config.json', JSON.stringify({ maxDrainsWithoutPoll: 3 }));

        expect(loadConfig({ env: { COOPLOOP_CONFIG: file } }).maxDrainsWithoutPoll).toBe(3);
    });

    it('rejects invalid values with path-prefixed messages', () => {
        let caught: unknown;
        try {
            loadConfig({ env: { COOPLOOP_MAX_DRAINS_WITHOUT_POLL: '0' } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        if (caught instanceof ConfigError) {
            expect(caught.errors).toHaveLength(1);
            expect(caught.errors[0]).toMatch(/^maxDrainsWithoutPoll: /);
        }
    });

    it('rejects a missing file', () => {
        const file = join(dir, 'absent.json');

        expect(() => loadConfig({ file, env: {} })).toThrow(`Config file not found: ${file}`);
    });

    it('rejects a file that is not a JSON object', () => {
        const file = writeJson('list.json', '[1, 2]');

        expect(() => loadConfig({ file, env: {} })).toThrow(ConfigError);
    });

    it('rejects a file that is not JSON', () => {
        const file = writeJson('broken.json', '{ nope');

        expect(() => loadConfig({ file, env: {} })).toThrow(`Failed to parse ${file}`);
    });

    it('validates config objects', () => {
        expect(validateConfig({})).toEqual({ valid: true });

        const result = validateConfig({ errorPolicy: 'ignore' });
        expect(result.valid).toBe(false);
        expect(result.errors?.[0]).toMatch(/^errorPolicy: /);
    });

    it('builds a scheduler from a resolved config', async () => {
        const clock = new VirtualClock();
        const config = loadConfig({ env: { COOPLOOP_ERROR_POLICY: 'report' } });
        const scheduler = Scheduler.fromConfig(config, {
            clock,
            multiplexer: new VirtualMultiplexer(clock),
            logger: silentLogger,
        });

        scheduler.callSoon(() => {
            throw new Error('ignored under report');
        });

        await expect(scheduler.run()).resolves.toBeUndefined();
        expect(scheduler.getStats().failed).toBe(1);
    });
});
