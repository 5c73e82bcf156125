import type { MaybePromise } from '@httptoolkit/util';
import * as http from 'http';

import type { HttpBinConfig } from '../config.js';
import type { EndpointMeta } from './groups.js';

export type HttpRequest = http.IncomingMessage;
export type HttpResponse = http.ServerResponse;

export type HttpHandler = (
    req: HttpRequest,
    res: HttpResponse,
    options: {
        path: string;
        url: URL;
        query: URLSearchParams;
        config: HttpBinConfig;
    }
) => MaybePromise<void>;

export interface HttpEndpoint {
    /** Return true if this endpoint handles the path (and its required query parameters) */
    matchPath: (path: string, query: URLSearchParams) => boolean;
    /** Accepted methods. Every method is accepted if this is omitted. */
    methods?: readonly string[];
    handle: HttpHandler;
    meta?: EndpointMeta;
}

export * from './http/home.js';
export * from './http/ip.js';
export * from './http/user-agent.js';
export * from './http/headers.js';
export * from './http/methods.js';
export * from './http/redirect.js';
export * from './http/status.js';
export * from './http/bytes.js';
export * from './http/delay.js';
export * from './http/stream.js';
export * from './http/drip.js';
export * from './http/cookies.js';
export * from './http/cache.js';
export * from './http/encoding/gzip.js';
export * from './http/encoding/deflate.js';
export * from './http/encoding/brotli.js';
export * from './http/html.js';
export * from './http/xml.js';
export * from './http/robots.txt.js';
export * from './http/deny.js';
export * from './http/basic-auth.js';
export * from './http/images.js';
