import { HealthService } from '../../src/grpc/health.service';
import { EventLoopMonitor, createBackpressureCheck } from '../../src/services/event-loop-monitor';
import { queryResult } from '../helpers/memory';

describe('createBackpressureCheck', () => {
    const limits = { maxInFlight: 2, maxEventLoopLag: 50 };

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('lets the poller run below both limits', () => {
        expect(createBackpressureCheck(limits, () => 1, () => 10)()).toBe(false);
    });

    it('holds the poller at the in-flight limit', () => {
        expect(createBackpressureCheck(limits, () => 2, () => 0)()).toBe(true);
        expect(console.warn).toHaveBeenCalledWith('[backpressure] in-flight executions 2 >= 2');
    });

    it('holds the poller while the event loop lags', () => {
        expect(createBackpressureCheck(limits, () => 0, () => 75.5)()).toBe(true);
        expect(console.warn).toHaveBeenCalledWith('[backpressure] event loop lag 75.50ms >= 50ms');
    });

    it('reads lag from a live monitor', () => {
        const monitor = new EventLoopMonitor();
        expect(monitor.lag).toBeGreaterThanOrEqual(0);
        monitor.disable();
    });
});

describe('HealthService', () => {
    const okPool = () => ({ query: jest.fn().mockResolvedValue(queryResult([{ '?column?': 1 }])) });

    it('serves while Postgres and Redis answer', async () => {
        const health = new HealthService(okPool(), { ping: jest.fn().mockResolvedValue('PONG') });
        const callback = jest.fn();

        await health.check({ request: { service: '' } }, callback);

        expect(callback).toHaveBeenCalledWith(null, { status: 'SERVING' });
    });

    it('stops serving when a dependency fails', async () => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const health = new HealthService(okPool(), { ping: jest.fn().mockRejectedValue(new Error('connection refused')) });

        expect(await health.status()).toBe('NOT_SERVING');
        jest.restoreAllMocks();
    });
});
