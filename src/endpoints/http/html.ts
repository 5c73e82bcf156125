import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpContentExamples } from '../groups.js';
import { readAsset } from '../../assets.js';

const mobyDickHtml = readAsset('moby-dick.html');

const matchPath = (path: string) => path === '/html';

const handle: HttpHandler = (_req, res) => {
    res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
    res.end(mobyDickHtml);
}

export const html: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/html',
        description: 'Returns a fixed HTML document.',
        examples: ['/html'],
        group: httpContentExamples
    }
};
