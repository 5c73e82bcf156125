import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpCaching } from '../groups.js';
import { handleGet } from './methods.js';

const CACHE_CONTROL_PATTERN = /^\/cache\/(\d+)$/;

const handleConditional: HttpHandler = (req, res, options) => {
    if (req.headers['if-modified-since'] || req.headers['if-none-match']) {
        res.writeHead(304).end();
        return;
    }

    return handleGet(req, res, options);
}

const handleCacheControl: HttpHandler = (req, res, options) => {
    const maxAge = BigInt(CACHE_CONTROL_PATTERN.exec(options.path)?.[1] ?? '0');
    res.setHeader('cache-control', `public, max-age=${maxAge}`);
    return handleGet(req, res, options);
}

export const cache: HttpEndpoint = {
    matchPath: (path) => path === '/cache',
    methods: READ_METHODS,
    handle: handleConditional,
    meta: {
        path: '/cache',
        description: 'Returns 304 Not Modified if the request is conditional (If-Modified-Since or If-None-Match), or the /get response otherwise.',
        examples: ['/cache'],
        group: httpCaching
    }
};

export const cacheControl: HttpEndpoint = {
    matchPath: (path) => CACHE_CONTROL_PATTERN.test(path),
    methods: READ_METHODS,
    handle: handleCacheControl,
    meta: {
        path: '/cache/{seconds}',
        description: 'Returns the /get response with a "Cache-Control: public, max-age={seconds}" header.',
        examples: ['/cache/60'],
        group: httpCaching
    }
};
