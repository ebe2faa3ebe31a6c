import { HeartbeatService } from '../../src/services/heartbeat.service';
import { sleep } from '../helpers/poll';

describe('HeartbeatService', () => {
    let updateHeartbeat: jest.Mock<Promise<void>, [string]>;
    let heartbeat: HeartbeatService;

    beforeEach(() => {
        updateHeartbeat = jest.fn().mockResolvedValue(undefined);
        heartbeat = new HeartbeatService({ updateHeartbeat }, 50);
    });

    afterEach(() => {
        heartbeat.stopAll();
        jest.restoreAllMocks();
    });

    it('beats immediately and then on every interval', async () => {
        heartbeat.start('exec-1');
        expect(updateHeartbeat).toHaveBeenCalledWith('exec-1');

        await sleep(140);
        expect(updateHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);
        expect(heartbeat.isRunning('exec-1')).toBe(true);
        expect(heartbeat.activeCount).toBe(1);
    });

    it('stops one execution and keeps the others', async () => {
        heartbeat.start('exec-1');
        heartbeat.start('exec-2');
        heartbeat.stop('exec-1');

        updateHeartbeat.mockClear();
        await sleep(75);

        expect(updateHeartbeat).not.toHaveBeenCalledWith('exec-1');
        expect(updateHeartbeat).toHaveBeenCalledWith('exec-2');
        expect(heartbeat.activeCount).toBe(1);
    });

    it('ignores a second start for the same execution', () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        heartbeat.start('exec-1');
        heartbeat.start('exec-1');

        expect(updateHeartbeat).toHaveBeenCalledTimes(1);
        expect(heartbeat.activeCount).toBe(1);
    });

    it('logs a failed update and keeps beating', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        updateHeartbeat.mockRejectedValueOnce(new Error('db down'));

        heartbeat.start('exec-1');
        await sleep(75);

        expect(error).toHaveBeenCalledWith('[heartbeat] failed to update for execution exec-1:', expect.any(Error));
        expect(updateHeartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);
    });

    it('stopAll stops everything', async () => {
        heartbeat.start('exec-1');
        heartbeat.start('exec-2');
        heartbeat.stopAll();

        updateHeartbeat.mockClear();
        await sleep(100);
        expect(updateHeartbeat).not.toHaveBeenCalled();
        expect(heartbeat.activeCount).toBe(0);
    });
});
