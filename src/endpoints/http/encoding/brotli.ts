import * as zlib from 'node:zlib';

import type { HttpEndpoint, HttpHandler } from '../../http-index.js';
import { READ_METHODS } from '../../http-methods.js';
import { httpContentEncoding } from '../../groups.js';
import { writeCompressedEnvelope } from './compressed-json.js';

const matchPath = (path: string) => path === '/brotli';

const handle: HttpHandler = (req, res) =>
    writeCompressedEnvelope(req, res, {
        contentEncoding: 'br',
        compressor: zlib.createBrotliCompress(),
        flags: { compressed: true }
    });

export const brotli: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/brotli',
        description: 'Returns brotli-encoded JSON data, including the request headers and origin.',
        examples: ['/brotli'],
        group: httpContentEncoding
    }
};
