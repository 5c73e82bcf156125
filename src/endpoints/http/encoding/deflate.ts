import * as zlib from 'node:zlib';

import type { HttpEndpoint, HttpHandler } from '../../http-index.js';
import { READ_METHODS } from '../../http-methods.js';
import { httpContentEncoding } from '../../groups.js';
import { writeCompressedEnvelope } from './compressed-json.js';

const matchPath = (path: string) => path === '/deflate';

// HTTP's 'deflate' is the zlib format (RFC 1950), not a raw deflate stream
const handle: HttpHandler = (req, res) =>
    writeCompressedEnvelope(req, res, {
        contentEncoding: 'deflate',
        compressor: zlib.createDeflate({ level: zlib.constants.Z_BEST_COMPRESSION }),
        flags: { deflated: true }
    });

export const deflate: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/deflate',
        description: 'Returns deflate-encoded JSON data, including the request headers and origin.',
        examples: ['/deflate'],
        group: httpContentEncoding
    }
};
