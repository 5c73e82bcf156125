import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpRequestInspection } from '../groups.js';
import { writeJson } from '../../util.js';

const matchPath = (path: string) => path === '/user-agent';

const handle: HttpHandler = (req, res) => {
    writeJson(res, {
        'user-agent': req.headers['user-agent'] ?? ''
    });
}

export const userAgent: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/user-agent',
        description: 'Returns the User-Agent header of the request, or an empty string if none was sent.',
        examples: ['/user-agent'],
        group: httpRequestInspection
    }
};
