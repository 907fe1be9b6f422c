import { probeReachability } from '~/probes/icmp.probe';

jest.mock('ping', () => ({
    promise: {
        probe: jest.fn(),
    },
}));

const { promise: { probe } } = jest.requireMock<{ promise: { probe: jest.Mock } }>('ping');

const ENDPOINT = { host: '192.0.2.10', port: 8080 };

describe('probeReachability', () => {
    beforeEach(() => {
        probe.mockReset();
    });

    it('should succeed on an echo reply and report its time', async () => {
        probe.mockResolvedValue({ alive: true, time: 12.5 });

        expect(await probeReachability(ENDPOINT, 2500)).toEqual({ success: true, payload: { timeMs: 12.5 } });
        // the system ping takes whole seconds
        expect(probe).toHaveBeenCalledWith('192.0.2.10', { timeout: 3, deadline: 3 });
    });

    it('should leave the time out when ping could not measure it', async () => {
        probe.mockResolvedValue({ alive: true, time: 'unknown' });

        expect(await probeReachability(ENDPOINT, 500)).toEqual({ success: true, payload: { timeMs: undefined } });
        expect(probe).toHaveBeenCalledWith('192.0.2.10', { timeout: 1, deadline: 1 });
    });

    it('should end the system ping within a second of the timeout', async () => {
        probe.mockResolvedValue({ alive: true, time: 3 });

        await probeReachability(ENDPOINT, 1200);

        expect(probe).toHaveBeenCalledWith('192.0.2.10', { timeout: 2, deadline: 2 });
    });

    it('should fail without an echo reply', async () => {
        probe.mockResolvedValue({ alive: false, time: 'unknown' });

        expect(await probeReachability(ENDPOINT, 1000)).toEqual({
            success: false,
            reason: 'no echo reply from 192.0.2.10',
        });
    });

    it('should fail when ping itself fails', async () => {
        probe.mockRejectedValue(new Error('spawn ping ENOENT'));

        expect(await probeReachability(ENDPOINT, 1000)).toEqual({ success: false, reason: 'spawn ping ENOENT' });
    });

    it('should not wait past the timeout', async () => {
        probe.mockReturnValue(new Promise(() => undefined));

        expect(await probeReachability(ENDPOINT, 100)).toEqual({
            success: false,
            reason: 'ProbeTimeoutError: no answer within 100ms',
        });
    });
});
