import { StatusError } from '@httptoolkit/util';

import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpDynamicData } from '../groups.js';
import {
    isInformationalStatus,
    sleepWhileOpen,
    writeErrorJson,
    writeInformational
} from '../../util.js';

const NUMBYTES_PATTERN = /^\d+$/;
const DURATION_PATTERN = /^\d+(?:\.\d+)?$/;
const CODE_PATTERN = /^[-+]?\d+$/;

const matchPath = (path: string, query: URLSearchParams) =>
    path === '/drip' &&
    NUMBYTES_PATTERN.test(query.get('numbytes') ?? '') &&
    DURATION_PATTERN.test(query.get('duration') ?? '');

const parseCode = (codeParam: string | null) => {
    if (!codeParam) return 200;
    if (!CODE_PATTERN.test(codeParam)) return undefined;

    const code = parseInt(codeParam, 10);
    // 101 can't be sent without an upgrade request
    return code >= 100 && code <= 999 && code !== 101 ? code : undefined;
};

const parseDelaySeconds = (delayParam: string | null) => {
    if (!delayParam) return 0;

    const delaySeconds = Number(delayParam);
    return Number.isFinite(delaySeconds) && delaySeconds >= 0
        ? delaySeconds
        : undefined;
};

const handle: HttpHandler = async (_req, res, { query }) => {
    const numBytes = parseInt(query.get('numbytes') ?? '0', 10);
    if (!Number.isSafeInteger(numBytes)) {
        throw new StatusError(400, `Unsupported byte count ${numBytes}`);
    }
    const durationMs = parseFloat(query.get('duration') ?? '0') * 1000;

    const statusCode = parseCode(query.get('code'));
    if (statusCode === undefined) {
        writeErrorJson(res, 500, "failed to parse 'code'");
        return;
    }

    const delaySeconds = parseDelaySeconds(query.get('delay'));
    if (delaySeconds === undefined) {
        writeErrorJson(res, 500, "failed to parse 'delay'");
        return;
    }

    if (!await sleepWhileOpen(res, delaySeconds * 1000)) return;

    // A 1xx is only ever interim, so the bytes follow in a 200
    if (isInformationalStatus(statusCode)) writeInformational(res, statusCode);

    res.writeHead(isInformationalStatus(statusCode) ? 200 : statusCode, {
        'content-type': 'application/octet-stream',
        'content-length': numBytes
    });

    // No bytes means no pacing at all, just an empty body
    if (numBytes === 0) {
        res.end();
        return;
    }

    res.flushHeaders();

    const intervalMs = durationMs / numBytes;
    for (let i = 0; i < numBytes; i++) {
        res.write('*');
        if (!await sleepWhileOpen(res, intervalMs)) return; // Client has gone away
    }

    res.end();
}

export const drip: HttpEndpoint = {
    matchPath,
    methods: READ_METHODS,
    handle,
    meta: {
        path: '/drip?numbytes={n}&duration={seconds}&delay={seconds}&code={code}',
        description: 'Sends numbytes bytes spread evenly over duration seconds, after an optional initial delay and with an optional status code.',
        examples: ['/drip?numbytes=5&duration=5', '/drip?numbytes=10&duration=2&delay=1&code=201'],
        group: httpDynamicData
    }
};
