import * as Cookie from 'cookie';

import type { HttpEndpoint } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpCookies } from '../groups.js';
import { getCookies, isValidCookieName } from '../../httpbin-compat.js';
import { writeJson } from '../../util.js';

// Unique query keys, dropping any that can't be sent as a cookie name
const getCookieNames = (query: URLSearchParams) =>
    [...new Set(query.keys())].filter((key) => {
        if (isValidCookieName(key)) return true;
        console.log(`Skipping invalid cookie name ${JSON.stringify(key)}`);
        return false;
    });

export const getCookiesEndpoint: HttpEndpoint = {
    matchPath: (path) => path === '/cookies',
    methods: READ_METHODS,
    handle: (req, res) => {
        writeJson(res, { cookies: getCookies(req) });
    },
    meta: {
        path: '/cookies',
        description: 'Returns the cookies sent with the request.',
        examples: ['/cookies'],
        group: httpCookies
    }
}

export const setCookies: HttpEndpoint = {
    matchPath: (path) => path === '/cookies/set',
    methods: READ_METHODS,
    handle: (_req, res, { query }) => {
        const cookieHeaders = getCookieNames(query).map((key) =>
            Cookie.serialize(key, query.get(key) ?? '', { // For duplicates, we use the first only
                path: '/'
            })
        );

        res.writeHead(302, {
            'location': '/cookies',
            'set-cookie': cookieHeaders
        }).end();
    },
    meta: {
        path: '/cookies/set?{name}={value}',
        description: 'Sets a cookie for each query parameter, then redirects to /cookies.',
        examples: ['/cookies/set?flavour=oatmeal'],
        group: httpCookies
    }
}

export const deleteCookies: HttpEndpoint = {
    matchPath: (path) => path === '/cookies/delete',
    methods: READ_METHODS,
    handle: (_req, res, { query }) => {
        const cookieHeaders = getCookieNames(query).map((key) =>
            `${key}=; Expires=Thu, 01-Jan-1970 00:00:00 GMT; Max-Age=0; Path=/`
        );

        res.writeHead(302, {
            'location': '/cookies',
            'set-cookie': cookieHeaders
        }).end();
    },
    meta: {
        path: '/cookies/delete?{name}',
        description: 'Expires each cookie named in the query parameters, then redirects to /cookies.',
        examples: ['/cookies/delete?flavour'],
        group: httpCookies
    }
}
