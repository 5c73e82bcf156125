import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpContentExamples } from '../groups.js';

const matchPath = (path: string) => path === '/robots.txt';

const handle: HttpHandler = (_req, res) => {
    res.writeHead(200, { 'content-type': 'text/plain' });
    res.end('User-agent: *\nDisallow: /deny\n');
}

export const robotsTxt: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/robots.txt',
        description: 'Returns a robots.txt file that disallows /deny.',
        examples: ['/robots.txt'],
        group: httpContentExamples
    }
};
