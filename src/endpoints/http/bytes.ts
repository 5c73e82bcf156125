import * as stream from 'stream';
import { pipeline } from 'stream/promises';
import { StatusError } from '@httptoolkit/util';

import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpDynamicData } from '../groups.js';
import { generateSeededBytes, parseSeed } from '../../seeded-bytes.js';

const BYTES_PATTERN = /^\/bytes\/(\d+)$/;

const handle: HttpHandler = async (_req, res, { path, query, config }) => {
    const length = parseInt(BYTES_PATTERN.exec(path)?.[1] ?? '0', 10);
    if (!Number.isSafeInteger(length)) {
        throw new StatusError(400, `Unsupported byte count ${length}`);
    }

    const seed = parseSeed(query.get('seed'));

    res.writeHead(200, {
        'content-type': 'application/octet-stream',
        'content-length': length
    });

    // One chunk in memory at a time
    await pipeline(
        stream.Readable.from(generateSeededBytes(seed, length, config.binaryChunkSize)),
        res
    );
}

export const bytes: HttpEndpoint = {
    matchPath: (path) => BYTES_PATTERN.test(path),
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/bytes/{n}?seed={seed}',
        description: 'Returns n pseudo-random bytes. The same integer seed always returns the same bytes; without a seed every response differs.',
        examples: ['/bytes/1024', '/bytes/16?seed=42'],
        group: httpDynamicData
    }
};
