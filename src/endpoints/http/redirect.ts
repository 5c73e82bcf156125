import type { HttpEndpoint, HttpResponse } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpRedirects } from '../groups.js';

const REDIRECT_PATTERN = /^\/redirect\/(\d+)$/;
const ABSOLUTE_REDIRECT_PATTERN = /^\/absolute-redirect\/(\d+)$/;

// Hop counts of any length
const parseHops = (path: string, pattern: RegExp) =>
    BigInt(pattern.exec(path)?.[1] ?? '0');

const nextLocation = (endpointPrefix: string, hops: bigint) =>
    hops <= 1n
        ? '/get'
        : `${endpointPrefix}/${hops - 1n}`;

const sendRedirect = (res: HttpResponse, location: string) => {
    res.writeHead(302, { location });
    res.end();
};

export const redirect: HttpEndpoint = {
    matchPath: (path) => REDIRECT_PATTERN.test(path),
    methods: READ_METHODS,
    handle: (_req, res, { path }) => {
        const hops = parseHops(path, REDIRECT_PATTERN);
        sendRedirect(res, nextLocation('/redirect', hops));
    },
    meta: {
        path: '/redirect/{n}',
        description: 'Redirects n times with relative Location headers, ending at /get.',
        examples: ['/redirect/3'],
        group: httpRedirects
    }
};

export const absoluteRedirect: HttpEndpoint = {
    matchPath: (path) => ABSOLUTE_REDIRECT_PATTERN.test(path),
    methods: READ_METHODS,
    handle: (req, res, { path, url }) => {
        const hops = parseHops(path, ABSOLUTE_REDIRECT_PATTERN);
        const host = req.headers.host ?? url.host;
        sendRedirect(res, `http://${host}${nextLocation('/absolute-redirect', hops)}`);
    },
    meta: {
        path: '/absolute-redirect/{n}',
        description: 'Redirects n times with absolute Location headers, ending at /get.',
        examples: ['/absolute-redirect/3'],
        group: httpRedirects
    }
};

export const redirectTo: HttpEndpoint = {
    matchPath: (path, query) => path === '/redirect-to' && !!query.get('url'),
    methods: READ_METHODS,
    // No validation of the target at all: an open redirect
    handle: (_req, res, { query }) => {
        sendRedirect(res, query.get('url') ?? '');
    },
    meta: {
        path: '/redirect-to?url={url}',
        description: 'Redirects once, to any URL given in the url query parameter.',
        examples: ['/redirect-to?url=/ip'],
        group: httpRedirects
    }
};
