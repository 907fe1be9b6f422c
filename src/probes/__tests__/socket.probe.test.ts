import { closedEndpoint, RunningServer, startTcpServer } from '~/__tests__/helpers/servers';
import { SOCKS_PROBE_TARGET } from '~/config';
import { buildSocks4Connect, probeSocks4, probeSocks5, probeTcp, SOCKS5_GREETING } from '~/probes/socket.probe';

describe('socket probes', () => {
    let server: RunningServer | undefined;

    afterEach(async () => {
        await server?.close();
        server = undefined;
    });

    describe('buildSocks4Connect', () => {
        it('should encode version, command, port, ip and an empty user id', () => {
            expect([ ...buildSocks4Connect({ host: '8.8.8.8', port: 80 }) ]).toEqual([ 4, 1, 0, 80, 8, 8, 8, 8, 0 ]);
        });

        it('should write the port big-endian', () => {
            expect([ ...buildSocks4Connect({ host: '192.0.2.1', port: 1080 }).subarray(2, 4) ]).toEqual([ 4, 56 ]);
        });

        it('should refuse a hostname target', () => {
            expect(() => buildSocks4Connect({ host: 'example.com', port: 80 })).toThrow('ipv4');
        });
    });

    describe('probeTcp', () => {
        it('should succeed against an open port', async () => {
            server = await startTcpServer();

            expect(await probeTcp(server.endpoint, 1000)).toEqual({ success: true, payload: undefined });
        });

        it('should fail against a closed port', async () => {
            const result = await probeTcp(await closedEndpoint(), 1000);

            expect(result.success).toBe(false);
        });
    });

    describe('probeSocks5', () => {
        it('should send the no-auth greeting and accept [5, 0]', async () => {
            const received: Buffer[] = [];
            server = await startTcpServer(Buffer.from([ 0x05, 0x00 ]), received);

            const result = await probeSocks5(server.endpoint, 1000);

            expect(result.success).toBe(true);
            expect(Buffer.concat(received).equals(SOCKS5_GREETING)).toBe(true);
        });

        it('should fail when no acceptable method is offered', async () => {
            server = await startTcpServer(Buffer.from([ 0x05, 0xff ]));

            expect(await probeSocks5(server.endpoint, 1000)).toEqual({
                success: false,
                reason: 'socks5 greeting rejected with 05ff',
            });
        });

        it('should wait for the whole reply and fail on a truncated one', async () => {
            server = await startTcpServer(Buffer.from([ 0x05 ]));

            expect(await probeSocks5(server.endpoint, 300)).toEqual({
                success: false,
                reason: 'ProbeTimeoutError: no answer within 300ms',
            });
        });

        it('should give up on a silent peer once the timeout is over', async () => {
            server = await startTcpServer();
            const started = Date.now();

            const result = await probeSocks5(server.endpoint, 200);

            expect(result).toEqual({ success: false, reason: 'ProbeTimeoutError: no answer within 200ms' });
            expect(Date.now() - started).toBeLessThan(1000);
        });
    });

    describe('probeSocks4', () => {
        it('should send a connect request for the probe target and accept status 90', async () => {
            const received: Buffer[] = [];
            server = await startTcpServer(Buffer.from([ 0, 90, 0, 0, 0, 0, 0, 0 ]), received);

            const result = await probeSocks4(server.endpoint, 1000);

            expect(result.success).toBe(true);
            expect(Buffer.concat(received).equals(buildSocks4Connect(SOCKS_PROBE_TARGET))).toBe(true);
        });

        it('should fail on a rejected request', async () => {
            server = await startTcpServer(Buffer.from([ 0, 91, 0, 0, 0, 0, 0, 0 ]));

            expect(await probeSocks4(server.endpoint, 1000)).toEqual({
                success: false,
                reason: 'socks4 request rejected with status 91',
            });
        });

        it('should fail against a closed port', async () => {
            const result = await probeSocks4(await closedEndpoint(), 1000);

            expect(result.success).toBe(false);
        });
    });
});
