import * as http from 'http';

import { createHttpHandler } from './http-handler.js';
import { buildConfig, parseListenAddress, type HttpBinConfig } from './config.js';

export interface ServerOptions {
    config?: Partial<HttpBinConfig>;
}

/**
 * Creates an HTTP server with every endpoint registered, using the given tunables on top
 * of the defaults. The server is not listening yet: call `listen()` on the result.
 */
export async function createServer(options: ServerOptions = {}): Promise<http.Server> {
    return createHttpHandler(buildConfig(options.config));
}

export type { HttpBinConfig } from './config.js';
export { DEFAULT_CONFIG } from './config.js';

// This is not a perfect test (various odd cases) but good enough
const wasRunDirectly = import.meta.filename === process?.argv[1];
if (wasRunDirectly) {
    const { host, port } = parseListenAddress(process.env.LISTEN_ADDRESS ?? ':8080');

    createServer().then((server) => {
        server.listen(port, host, () => {
            console.log(`HTTPBin fixtures listening on ${host ?? '*'}:${port}`);
        });
    }).catch((e) => {
        console.error('Failed to start server', e);
        process.exitCode = 1;
    });
}
