import axios from 'axios';
import { Readable } from 'stream';
import { SPEED_TEST_URL } from '~/config';
import { raceWithTimeout } from '~/probes/timeout';
import { ProbeResult, settleProbe } from '~/probes/types';
import { Endpoint } from '~/types';
import { toAxiosProxyConfig } from '~/utils';

export interface SpeedMeasurement {
    // the whole request, body included
    latencyMs: number,
    downloadSpeedKBps: number,
    bytes: number,
}

function countBytes(stream: Readable): Promise<number> {
    return new Promise((resolve, reject) => {
        let bytes = 0;

        stream.on('data', (chunk: Buffer | string) => {
            bytes += chunk.length;
        });
        stream.once('end', () => resolve(bytes));
        stream.once('error', reject);
        stream.once('close', () => reject(new Error(`download interrupted after ${ bytes } bytes`)));
    });
}

// Downloads the reference payload through the proxy.
export function probeSpeed(endpoint: Endpoint, timeout: number, url: string = SPEED_TEST_URL): Promise<ProbeResult<SpeedMeasurement>> {
    return settleProbe(raceWithTimeout(async (signal) => {
        const started = Date.now();

        const response = await axios.get<Readable>(url, {
            proxy: toAxiosProxyConfig(endpoint),
            timeout,
            signal,
            responseType: 'stream',
        });

        signal.addEventListener('abort', () => response.data.destroy(), { once: true });

        const bytes = await countBytes(response.data);
        const elapsed = Math.max(1, Date.now() - started);

        return {
            latencyMs: elapsed,
            downloadSpeedKBps: Math.round(bytes / 1024 / (elapsed / 1000) * 100) / 100,
            bytes,
        };
    }, timeout));
}
