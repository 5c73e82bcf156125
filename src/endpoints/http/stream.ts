import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpDynamicData } from '../groups.js';
import { sleepWhileOpen } from '../../util.js';

const STREAM_PATTERN = /^\/stream\/(\d+)$/;

const handle: HttpHandler = async (_req, res, { path, config }) => {
    const lineCount = parseInt(STREAM_PATTERN.exec(path)?.[1] ?? '0', 10);

    res.writeHead(200, { 'content-type': 'application/json' });
    res.flushHeaders();

    for (let n = 0; n < lineCount; n++) {
        if (!await sleepWhileOpen(res, config.streamIntervalMs)) return; // Client has gone away

        res.write(JSON.stringify({
            n,
            time: new Date().toISOString()
        }) + '\n');
    }

    res.end();
}

export const streamEndpoint: HttpEndpoint = {
    matchPath: (path) => STREAM_PATTERN.test(path),
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/stream/{n}',
        description: 'Streams n newline-delimited JSON objects ({"n", "time"}), one per second by default.',
        examples: ['/stream/5'],
        group: httpDynamicData
    }
};
