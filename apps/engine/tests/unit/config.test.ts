import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        const config = loadConfig({});
        expect(config).toMatchObject({
            port: 50051,
            redisUrl: 'redis://localhost:6379',
            lockTtlMs: 60000,
            pollBatchSize: 10,
            reaperStale: 300,
            reaperInterval: 10000,
            maxRecoveries: 3,
            maxInFlight: 100,
            maxEventLoopLag: 100,
            defaultOperation: 'render',
            notifyWebhookUrl: null,
        });
        expect(config.workerId).toMatch(/^worker-[0-9a-f]{8}$/);
    });

    it('reads overrides and ignores numbers it cannot parse', () => {
        const config = loadConfig({ PORT: '6000', MAX_RECOVERIES: 'many', DEFAULT_OPERATION: 'diff' });
        expect(config.port).toBe(6000);
        expect(config.maxRecoveries).toBe(3);
        expect(config.defaultOperation).toBe('diff');
    });

    it('refuses an unknown default operation', () => {
        expect(() => loadConfig({ DEFAULT_OPERATION: 'destroy' }))
            .toThrow('DEFAULT_OPERATION must be one of render, diff, apply, got "destroy"');
    });
});
