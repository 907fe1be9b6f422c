import { AxiosRequestConfig } from 'axios';

export interface EchoResponse {
    // The address (or forwarding chain) the echo service saw the request coming from.
    origin: string,
    headers: Record<string, string>,
}

export abstract class Echo {
    public abstract byHttp(options?: AxiosRequestConfig): Promise<EchoResponse>;
}
