import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { getDocsHtml } from '../../docs-page.js';

const handle: HttpHandler = (_req, res) => {
    res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
    res.end(getDocsHtml());
}

export const home: HttpEndpoint = {
    matchPath: (path) => path === '/',
    methods: READ_METHODS,
    handle
};
