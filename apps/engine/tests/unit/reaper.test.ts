import IORedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { queryResult } from '../helpers/memory';
import { LEADER_KEY } from '../../src/services/leader-elector';
import { Reaper } from '../../src/services/reaper';
import { sleep } from '../helpers/poll';

describe('Reaper', () => {
    let redis: Redis;
    let query: jest.Mock;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        redis = new IORedisMock();
        await redis.flushall();
        query = jest.fn().mockResolvedValue(queryResult([]));
    });

    afterEach(async () => {
        await redis.quit();
        jest.restoreAllMocks();
    });

    it('releases stale claims and fails executions out of recoveries', async () => {
        query
            .mockResolvedValueOnce(queryResult([{ id: 'e1', recovery_count: 1 }]))
            .mockResolvedValueOnce(queryResult([{ id: 'e2', recovery_count: 3 }]))
            .mockResolvedValueOnce(queryResult([], 1));
        const reaper = new Reaper({ query }, redis, { staleThresholdSeconds: 30, maxRecoveries: 3 });

        const reaped = await reaper.reap();

        expect(reaped).toEqual([
            { id: 'e1', recovery_count: 1, action: 'released' },
            { id: 'e2', recovery_count: 3, action: 'failed' },
        ]);
        expect(query).toHaveBeenCalledTimes(3);
        expect(query.mock.calls[0][1]).toEqual([['pending', 'scheduled', 'running', 'awaiting_approval'], 30, 3]);
        expect(query.mock.calls[1][1]).toEqual(['failed', ['pending', 'scheduled', 'running', 'awaiting_approval'], 30, 3]);
        expect(query.mock.calls[2][1]).toEqual(['failed', 'running', ['e2']]);
    });

    it('skips the step update when nothing is exhausted', async () => {
        const reaper = new Reaper({ query }, redis);

        expect(await reaper.reap()).toEqual([]);
        expect(query).toHaveBeenCalledTimes(2);
    });

    it('logs a failing cycle and returns what it has', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        query.mockRejectedValueOnce(new Error('db down'));
        const reaper = new Reaper({ query }, redis);

        expect(await reaper.reap()).toEqual([]);
        expect(error).toHaveBeenCalledWith('[reaper] error during reap cycle:', expect.any(Error));
    });

    it('only reaps while it holds leadership', async () => {
        await redis.set(LEADER_KEY, 'other-worker');
        const follower = new Reaper({ query }, redis, { workerId: 'worker-1', intervalMs: 50 });

        follower.start();
        await sleep(80);
        expect(query).not.toHaveBeenCalled();

        await redis.del(LEADER_KEY);
        await sleep(80);
        await follower.stop();

        expect(query).toHaveBeenCalled();
        expect(follower.isRunning()).toBe(false);
    });
});
