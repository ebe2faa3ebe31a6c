import IORedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { RedisLease } from '../../src/services/redis-lease';
import { waitUntil } from '../helpers/poll';

describe('RedisLease', () => {
    let redis: Redis;

    beforeEach(async () => {
        redis = new IORedisMock();
        await redis.flushall();
    });

    afterEach(async () => {
        await redis.quit();
    });

    it('lets one token hold the key at a time', async () => {
        const first = new RedisLease(redis, 'lease:a', 'token-1', 5000);
        const second = new RedisLease(redis, 'lease:a', 'token-2', 5000);

        expect(await first.acquire()).toBe(true);
        expect(await second.acquire()).toBe(false);
        expect(await first.isHeld()).toBe(true);
        expect(await second.isHeld()).toBe(false);

        expect(await second.release()).toBe(false);
        expect(await redis.get('lease:a')).toBe('token-1');

        expect(await first.release()).toBe(true);
        expect(await second.acquire()).toBe(true);
        await second.release();
    });

    it('takes back a key that already carries its token', async () => {
        await redis.set('lease:a', 'token-1');
        const lease = new RedisLease(redis, 'lease:a', 'token-1', 5000);

        expect(await lease.acquire()).toBe(true);
        expect(await redis.pttl('lease:a')).toBeGreaterThan(0);
        await lease.release();
    });

    it('does not renew a key another token took over', async () => {
        const lease = new RedisLease(redis, 'lease:a', 'token-1', 5000);
        await lease.acquire();
        await redis.set('lease:a', 'token-2');

        expect(await lease.renew()).toBe(false);
        expect(await redis.pttl('lease:a')).toBe(-1);
    });

    it('reports a lost key and stops renewing', async () => {
        const lease = new RedisLease(redis, 'lease:a', 'token-1', 100);
        const onLost = jest.fn();
        await lease.acquire();

        lease.keepAlive(onLost);
        await redis.set('lease:a', 'token-2');
        await waitUntil(() => onLost.mock.calls.length > 0, 2000, 20);

        expect(onLost).toHaveBeenCalledTimes(1);
        expect(await lease.release()).toBe(false);
        expect(await redis.get('lease:a')).toBe('token-2');
    });
});
