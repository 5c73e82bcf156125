import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpDynamicData } from '../groups.js';
import { handleGet } from './methods.js';
import { sleepWhileOpen } from '../../util.js';

const DELAY_PATTERN = /^\/delay\/(\d+(?:\.\d+)?)$/;

const handle: HttpHandler = async (req, res, options) => {
    const delaySeconds = parseFloat(DELAY_PATTERN.exec(options.path)?.[1] ?? '0');

    // Millisecond precision only
    const delayMs = Math.min(
        Math.floor(delaySeconds * 1000),
        options.config.delayMaxMs
    );
    if (!await sleepWhileOpen(res, delayMs)) return;

    return handleGet(req, res, options);
}

export const delayEndpoint: HttpEndpoint = {
    matchPath: (path) => DELAY_PATTERN.test(path),
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/delay/{seconds}',
        description: 'Waits for the given number of seconds (fractions allowed, capped at the configured maximum, 10 by default), then responds like /get.',
        examples: ['/delay/0.5', '/delay/3'],
        group: httpDynamicData
    }
};
