import * as zlib from 'node:zlib';

import type { HttpEndpoint, HttpHandler } from '../../http-index.js';
import { READ_METHODS } from '../../http-methods.js';
import { httpContentEncoding } from '../../groups.js';
import { writeCompressedEnvelope } from './compressed-json.js';

const matchPath = (path: string) => path === '/gzip';

const handle: HttpHandler = (req, res) =>
    writeCompressedEnvelope(req, res, {
        contentEncoding: 'gzip',
        compressor: zlib.createGzip(),
        flags: { gzipped: true }
    });

export const gzip: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/gzip',
        description: 'Returns gzip-encoded JSON data, including the request headers and origin.',
        examples: ['/gzip'],
        group: httpContentEncoding
    }
};
