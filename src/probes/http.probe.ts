import axios from 'axios';
import { HttpsProxyAgent } from 'hpagent';
import { AgentOptions as HttpsAgentOptions } from 'https';
import { Readable } from 'stream';
import { HTTPS_TEST_URL } from '~/config';
import { Echo, EchoResponse } from '~/echo/Echo';
import { raceWithTimeout } from '~/probes/timeout';
import { ProbeResult, settleProbe } from '~/probes/types';
import { Endpoint } from '~/types';
import { parseEndpointToUrl, toAxiosProxyConfig } from '~/utils';

export interface HttpsPayload {
    status: number,
}

// GET through the proxy to the echo service. The payload is what the service saw.
export function probeHttp(endpoint: Endpoint, timeout: number, echo: Echo): Promise<ProbeResult<EchoResponse>> {
    return settleProbe(raceWithTimeout((signal) => {
        return echo.byHttp({
            proxy: toAxiosProxyConfig(endpoint),
            timeout,
            signal,
        });
    }, timeout));
}

/**
 * GET through a CONNECT tunnel, only a 2xx answer counts.
 * `agentOptions` reach the tls connection made inside the tunnel, e.g. a `ca` for a private endpoint.
 */
export function probeHttps(
    endpoint: Endpoint,
    timeout: number,
    url: string = HTTPS_TEST_URL,
    agentOptions: HttpsAgentOptions = {},
): Promise<ProbeResult<HttpsPayload>> {
    return settleProbe(raceWithTimeout(async (signal) => {
        const agent = new HttpsProxyAgent({
            ...agentOptions,
            proxy: parseEndpointToUrl(endpoint),
            timeout,
        });

        try {
            const response = await axios.get<Readable>(url, {
                httpsAgent: agent,
                proxy: false,
                timeout,
                signal,
                maxRedirects: 0,
                responseType: 'stream',
                validateStatus: (status) => status >= 200 && status < 300,
            });

            // the body is of no interest
            response.data.destroy();

            return { status: response.status };
        } finally {
            agent.destroy();
        }
    }, timeout));
}
