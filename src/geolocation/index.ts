import axios from 'axios';
import { GEOLOCATION_URL } from '~/config';

export interface GeoInfo {
    country?: string,
    asn?: string,
}

export interface GeoLocator {
    // null when the service knows nothing about the ip
    lookup(ip: string, timeout: number): Promise<GeoInfo | null>;
}

interface IpApiResponse {
    status?: 'success' | 'fail',
    message?: string,
    country?: unknown,
    as?: unknown,
}

/**
 * ip-api.com compatible lookup: GET {url}{ip} answering { country, as }.
 */
export class IpApiGeolocation implements GeoLocator {
    constructor(private readonly _url: string = GEOLOCATION_URL) {
    }

    public async lookup(ip: string, timeout: number): Promise<GeoInfo | null> {
        const data = await axios
        .get<IpApiResponse | string>(this._url + encodeURIComponent(ip), {
            timeout,
            proxy: false,
        })
        .then((r) => r.data);

        if (typeof data !== 'object' || data === null || data.status === 'fail') return null;

        const info: GeoInfo = {};

        if (typeof data.country === 'string' && data.country) info.country = data.country;
        if (typeof data.as === 'string' && data.as) info.asn = data.as;

        return info.country || info.asn ? info : null;
    }
}
