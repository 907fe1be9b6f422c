import appRootPath from 'app-root-path';
import * as dotenv from 'dotenv-safe';
import * as path from 'path';

// It is necessary that process.env is filled before config.ts is evaluated.
dotenv.config({
    path: path.resolve(appRootPath.path, '.env'),
    example: path.resolve(appRootPath.path, '.env.example'),
    allowEmptyValues: true,
});

// It is necessary that typescript knows the environment variables (dotenv-safe checks their presence).
import {} from './types/env';

import { PORT } from '~/config';
import { Logger } from '~/logger';
import { ProxyChecker } from '~/proxy_checker';
import { Server } from '~/server';

const logger = new Logger('main');
const server = new Server(PORT);
const proxy_checker = new ProxyChecker();

proxy_checker.getEndpoints()
.forEach(({ path, method, handler }) => {
    server.addEndpoint(path, method, handler);
});

server.start()
.catch((e) => {
    logger.failure('server start', e, 'error');
    process.exitCode = 1;
});
