import { isIPv4, Socket } from 'net';
import { SOCKS_PROBE_TARGET } from '~/config';
import { raceWithTimeout } from '~/probes/timeout';
import { ProbeResult, settleProbe } from '~/probes/types';
import { Endpoint } from '~/types';

// version 5, 1 method, method 0 = no authentication
export const SOCKS5_GREETING = Buffer.from([ 0x05, 0x01, 0x00 ]);

const SOCKS4_REQUEST_GRANTED = 90;

export function buildSocks4Connect(target: Endpoint): Buffer {
    if (!isIPv4(target.host)) {
        throw new Error(`socks4 target must be an ipv4 address, got ${ target.host }`);
    }

    const request = Buffer.alloc(9);

    request[0] = 0x04;
    request[1] = 0x01;
    request.writeUInt16BE(target.port, 2);
    target.host.split('.').forEach((octet, i) => {
        request[4 + i] = +octet;
    });
    // empty user id, just the terminator
    request[8] = 0x00;

    return request;
}

/**
 * Connects, optionally writes a request and waits for a reply of the given length.
 * The socket is destroyed in every outcome, including the abort of the signal.
 */
function exchange(endpoint: Endpoint, signal: AbortSignal, request?: Buffer, reply_length = 0): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const socket = new Socket();
        let received = Buffer.alloc(0);
        let settled = false;

        const finish = (error: Error | null, reply?: Buffer) => {
            if (settled) return;
            settled = true;

            signal.removeEventListener('abort', onAbort);
            socket.destroy();

            if (error) reject(error);
            else resolve(reply ?? received);
        };

        function onAbort() {
            finish(new Error('aborted'));
        }

        if (signal.aborted) {
            onAbort();
            return;
        }

        signal.addEventListener('abort', onAbort);

        socket.once('error', (e) => finish(e));

        socket.once('close', () => {
            finish(new Error(`connection closed after ${ received.length } of ${ reply_length } reply bytes`));
        });

        socket.on('data', (chunk: Buffer) => {
            received = Buffer.concat([ received, chunk ]);

            if (received.length >= reply_length) {
                finish(null, received.subarray(0, reply_length));
            }
        });

        socket.connect(endpoint.port, endpoint.host, () => {
            if (!request || reply_length === 0) {
                finish(null, Buffer.alloc(0));
                return;
            }

            socket.write(request);
        });
    });
}

export function probeTcp(endpoint: Endpoint, timeout: number): Promise<ProbeResult> {
    return settleProbe(raceWithTimeout(async (signal) => {
        await exchange(endpoint, signal);
    }, timeout));
}

export function probeSocks5(endpoint: Endpoint, timeout: number): Promise<ProbeResult> {
    return settleProbe(raceWithTimeout(async (signal) => {
        const reply = await exchange(endpoint, signal, SOCKS5_GREETING, 2);

        if (reply[0] !== 0x05 || reply[1] !== 0x00) {
            throw new Error(`socks5 greeting rejected with ${ reply.toString('hex') }`);
        }
    }, timeout));
}

// Handshake acceptance only, the proxy is never asked to carry traffic to the target.
export function probeSocks4(endpoint: Endpoint, timeout: number, target: Endpoint = SOCKS_PROBE_TARGET): Promise<ProbeResult> {
    return settleProbe(raceWithTimeout(async (signal) => {
        const reply = await exchange(endpoint, signal, buildSocks4Connect(target), 8);

        if (reply[1] !== SOCKS4_REQUEST_GRANTED) {
            throw new Error(`socks4 request rejected with status ${ reply[1] }`);
        }
    }, timeout));
}
