import * as http from 'http';
import { StatusError } from '@httptoolkit/util';

import type { HttpBinConfig } from './config.js';
import { errorMessage, writeErrorJson } from './util.js';
import { httpEndpoints } from './endpoints/endpoint-index.js';

const allowCORS = (req: http.IncomingMessage, res: http.ServerResponse) => {
    const origin = req.headers['origin'];
    if (!origin) return;

    res.setHeader('access-control-allow-origin', origin);
    res.setHeader('access-control-allow-credentials', 'true');

    if (req.headers['access-control-request-method']) {
        res.setHeader('access-control-allow-methods', req.headers['access-control-request-method']);
    }

    if (req.headers['access-control-request-headers']) {
        res.setHeader('access-control-allow-headers', req.headers['access-control-request-headers']);
    }
}

export function createHttpHandler(config: HttpBinConfig) {
    async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
        const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
        const path = url.pathname;
        const query = url.searchParams;
        const method = req.method ?? 'GET';

        allowCORS(req, res);

        if (method === 'OPTIONS') {
            // Preflight CORS requests succeed for everything
            res.writeHead(200);
            res.end();
            return;
        }

        const pathEndpoints = httpEndpoints.filter((endpoint) =>
            endpoint.matchPath(path, query)
        );

        if (pathEndpoints.length === 0) {
            console.log(`Request to ${path} matched no endpoints`);
            throw new StatusError(404, `No handler for ${path}`);
        }

        const matchingEndpoint = pathEndpoints.find(({ methods }) =>
            !methods || methods.includes(method)
        );

        if (!matchingEndpoint) {
            const allowedMethods = [...new Set(pathEndpoints.flatMap(({ methods }) => methods ?? []))];
            console.log(`Request to ${path} matched no endpoints for ${method}`);
            res.setHeader('allow', allowedMethods.join(', '));
            throw new StatusError(405, `Method ${method} not allowed for ${path}`);
        }

        console.log(`Request to ${path} matched endpoint ${matchingEndpoint.name}`);
        await matchingEndpoint.handle(req, res, { path, url, query, config });
    }

    const handler = new http.Server(async (req, res) => {
        try {
            console.log(`Handling ${req.method} request to ${req.url}`);
            await handleRequest(req, res);
        } catch (e) {
            if (!(e instanceof StatusError)) console.error(e);

            if (res.closed) return;
            else if (res.headersSent) {
                res.destroy();
            } else {
                writeErrorJson(
                    res,
                    e instanceof StatusError ? e.statusCode : 500,
                    errorMessage(e)
                );
            }
        }
    });

    handler.on('error', (err) => console.error('HTTP server error', err));
    handler.on('clientError', (err, socket) => {
        console.error('HTTP client error', err);
        socket.destroy();
    });

    return handler;
}
