import { Redis } from 'ioredis';

const TAG = '[lease]';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("pexpire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/**
 * A Redis key owned by one token at a time and expiring after `ttlMs`.
 * Renew and release only touch the key while it still holds this lease's
 * token, so a lease that expired and was taken over leaves the new holder
 * alone.
 */
export class RedisLease {
    private renewal: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: Redis,
        readonly key: string,
        readonly token: string,
        private readonly ttlMs: number,
    ) { }

    async acquire(): Promise<boolean> {
        const result = await this.redis.set(this.key, this.token, 'PX', this.ttlMs, 'NX');
        if (result === 'OK') return true;
        // Same token already there: a holder that restarted takes its key back.
        return this.renew();
    }

    async renew(): Promise<boolean> {
        const renewed = await this.redis.eval(RENEW_SCRIPT, 1, this.key, this.token, this.ttlMs);
        return renewed === 1;
    }

    async release(): Promise<boolean> {
        this.stopKeepAlive();
        const released = await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.token);
        return released === 1;
    }

    async isHeld(): Promise<boolean> {
        return (await this.redis.get(this.key)) === this.token;
    }

    /**
     * Renews at half the TTL until `release`. Stops and calls `onLost` once
     * the key no longer carries this token.
     */
    keepAlive(onLost: () => void): void {
        if (this.renewal) return;
        this.renewal = setInterval(async () => {
            try {
                if (await this.renew()) return;
                this.stopKeepAlive();
                onLost();
            } catch (err) {
                console.error(`${TAG} renewal of ${this.key} failed:`, err);
            }
        }, this.ttlMs / 2);
    }

    private stopKeepAlive(): void {
        if (this.renewal) {
            clearInterval(this.renewal);
            this.renewal = null;
        }
    }
}
