import axios, { AxiosRequestConfig } from 'axios';
import { ECHO_URL } from '~/config';
import { Echo, EchoResponse } from '~/echo/Echo';
import { EchoFormatError } from '~/proxy_checker/errors';

interface HttpbinEchoResponse {
    origin: string,
    headers: Record<string, unknown>,
}

export class HttpbinEcho extends Echo {
    constructor(private readonly _url: string = ECHO_URL) {
        super();
    }

    public async byHttp(options?: AxiosRequestConfig): Promise<EchoResponse> {
        const data = await axios
        .get<unknown>(this._url, options)
        .then((r) => r.data);

        return Mapper.toEchoResponse(data);
    }
}

class Mapper {
    public static toEchoResponse(echo: unknown): EchoResponse {
        if (!Mapper._isHttpbinResponse(echo)) {
            throw new EchoFormatError('expected a json object with "origin" and "headers"');
        }

        const headers: Record<string, string> = {};

        for (const [ name, value ] of Object.entries(echo.headers)) {
            if (typeof value === 'string') headers[name] = value;
            else if (Array.isArray(value)) headers[name] = value.join(', ');
        }

        return {
            origin: echo.origin,
            headers,
        };
    }

    private static _isHttpbinResponse(value: unknown): value is HttpbinEchoResponse {
        if (typeof value !== 'object' || value === null) return false;

        return 'origin' in value && typeof value.origin === 'string'
            && 'headers' in value && typeof value.headers === 'object'
            && value.headers !== null
            && !Array.isArray(value.headers);
    }
}
