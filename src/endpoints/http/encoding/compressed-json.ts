import * as stream from 'stream';
import { pipeline } from 'stream/promises';

import type { HttpRequest, HttpResponse } from '../../http-index.js';
import { headersFragment, originFragment } from '../../../httpbin-compat.js';
import { errorMessage, serializeJson, writeErrorJson } from '../../../util.js';

/**
 * Writes the headers & origin of the request, plus the given flag fields, as JSON through the
 * given compressor. Resolves only once the compressor has been flushed into the response.
 */
export async function writeCompressedEnvelope(
    req: HttpRequest,
    res: HttpResponse,
    options: {
        contentEncoding: string,
        compressor: stream.Transform,
        flags: { [flag: string]: boolean }
    }
) {
    let body: string;
    try {
        body = serializeJson({
            ...headersFragment(req),
            ...originFragment(req),
            ...options.flags
        });
    } catch (e) {
        writeErrorJson(res, 500, `failed to write json: ${errorMessage(e)}`);
        return;
    }

    res.writeHead(200, {
        'content-type': 'application/json',
        'content-encoding': options.contentEncoding
    });

    await pipeline(
        stream.Readable.from([Buffer.from(body)]),
        options.compressor,
        res
    );
}
