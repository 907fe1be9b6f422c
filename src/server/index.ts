import bodyParser from 'body-parser';
import express, { Express, Request, RequestHandler, Response } from 'express';
import { Server as HttpServer } from 'http';
import { Logger } from '~/logger';
import { HttpMethod } from '~/server/types';

export class Server {
    private readonly _instance: Express;
    private _logger: Logger;
    private _server: HttpServer | undefined;
    private readonly _port: number;

    private _isStarted: boolean = false;

    constructor(port: number) {
        this._instance = express();
        this._logger = new Logger('Server');
        this._port = port;

        this._instance.use(bodyParser.json({ limit: '1mb' }));
        this._initEndpoints();
    }

    public get isStarted(): boolean {
        return this._isStarted;
    }

    // Resolves with the bound port, which differs from the requested one for port 0.
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            if (this._isStarted && this._server) {
                resolve(Server._portOf(this._server, this._port));
                return;
            }

            const server = this._instance.listen(this._port, () => {
                const port = Server._portOf(server, this._port);

                this._logger.log(`The server is running on port ${ port }`);
                this._isStarted = true;
                resolve(port);
            });

            server.once('error', reject);
            this._server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this._isStarted || !this._server) {
                resolve();
                return;
            }

            this._server.close((e) => {
                if (e) reject(e);
                else resolve();
            });
            this._isStarted = false;
        });
    }

    public addEndpoint(path: string, method: HttpMethod, handler: RequestHandler) {
        this._instance[method](path, handler);
        this._logger.log(`Endpoint <${ method.toUpperCase() }> ${ path } enabled`);
    }

    private static _portOf(server: HttpServer, fallback: number): number {
        const address = server.address();

        return typeof address === 'object' && address !== null ? address.port : fallback;
    }

    private _initEndpoints(): void {
        this._instance.get('/', (req: Request, res: Response) => {
            res.status(200);

            res.send('ok');
        });
    }
}
