import { WorkerHeartbeat } from '../../src/services/worker-heartbeat';
import { sleep } from '../helpers/poll';

describe('WorkerHeartbeat', () => {
    let target: { beat: jest.Mock; remove: jest.Mock };
    let heartbeat: WorkerHeartbeat;

    beforeEach(() => {
        target = {
            beat: jest.fn().mockResolvedValue(undefined),
            remove: jest.fn().mockResolvedValue(undefined),
        };
        heartbeat = new WorkerHeartbeat(target, 'worker-a', { intervalMs: 50, ttlSeconds: 30 });
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        await heartbeat.stop();
        jest.restoreAllMocks();
    });

    it('beats once on start and then on schedule', async () => {
        await heartbeat.start();
        expect(target.beat).toHaveBeenCalledTimes(1);
        expect(target.beat).toHaveBeenCalledWith('worker-a', 30);

        await sleep(130); // ~2 ticks
        expect(target.beat.mock.calls.length).toBeGreaterThanOrEqual(2);
        expect(heartbeat.isRunning()).toBe(true);
    });

    it('fails to start when the first beat fails', async () => {
        target.beat.mockRejectedValueOnce(new Error('connection refused'));
        await expect(heartbeat.start()).rejects.toThrow('connection refused');
        expect(heartbeat.isRunning()).toBe(false);
    });

    it('keeps beating after a failed tick', async () => {
        await heartbeat.start();
        target.beat.mockRejectedValueOnce(new Error('timeout'));

        await sleep(130);

        expect(console.error).toHaveBeenCalledWith('[heartbeat] failed to update for worker-a: timeout');
        expect(target.beat.mock.calls.length).toBeGreaterThanOrEqual(3);
    });

    it('stops beating and deregisters on stop', async () => {
        await heartbeat.start();
        await heartbeat.stop();
        target.beat.mockClear();

        await sleep(100);

        expect(target.beat).not.toHaveBeenCalled();
        expect(target.remove).toHaveBeenCalledWith('worker-a');
        expect(heartbeat.isRunning()).toBe(false);
    });
});
