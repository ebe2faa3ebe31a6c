import { ExecutionEntity } from '../../src/db/execution.entity';
import { Poller } from '../../src/services/poller';
import { execution } from '../helpers/fixtures';
import { sleep } from '../helpers/poll';

describe('Poller', () => {
    let claim: jest.Mock<Promise<ExecutionEntity[]>, [number, string]>;
    let onExecutionClaimed: jest.Mock<Promise<void>, [ExecutionEntity]>;
    let poller: Poller;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        claim = jest.fn().mockResolvedValue([]);
        onExecutionClaimed = jest.fn().mockResolvedValue(undefined);
        poller = new Poller({ claim }, { workerId: 'test-worker', onExecutionClaimed, batchSize: 2 });
    });

    afterEach(async () => {
        await poller.stop();
        jest.restoreAllMocks();
    });

    it('hands every claimed execution to the callback', async () => {
        claim
            .mockResolvedValueOnce([execution({ id: 'e1' }), execution({ id: 'e2' })])
            .mockResolvedValue([]);

        poller.start();
        await sleep(150);

        expect(claim).toHaveBeenCalledWith(2, 'test-worker');
        expect(onExecutionClaimed).toHaveBeenCalledWith(expect.objectContaining({ id: 'e1' }));
        expect(onExecutionClaimed).toHaveBeenCalledWith(expect.objectContaining({ id: 'e2' }));
    });

    it('backs off while nothing is claimable', async () => {
        poller.start();
        await sleep(350);

        // 0ms, then 200ms; the next poll waits 400ms
        expect(claim).toHaveBeenCalledTimes(2);
    });

    it('skips polling under backpressure', async () => {
        const checkBackpressure = jest.fn().mockReturnValue(true);
        poller = new Poller({ claim }, { workerId: 'test-worker', onExecutionClaimed, checkBackpressure });

        poller.start();
        await sleep(100);

        expect(checkBackpressure).toHaveBeenCalled();
        expect(claim).not.toHaveBeenCalled();
    });

    it('survives a failing claim and a failing callback', async () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        claim
            .mockRejectedValueOnce(new Error('db down'))
            .mockResolvedValueOnce([execution({ id: 'e1' })])
            .mockResolvedValue([]);
        onExecutionClaimed.mockRejectedValueOnce(new Error('boom'));

        poller.start();
        await sleep(650);

        expect(error).toHaveBeenCalledWith('[poller] claim error:', expect.any(Error));
        expect(error).toHaveBeenCalledWith('[poller] execution e1 callback error:', expect.any(Error));
        expect(poller.isRunning()).toBe(true);
    });
});
