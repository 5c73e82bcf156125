import type { HttpEndpoint, HttpHandler } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpRequestInspection } from '../groups.js';
import {
    type PostEnvelope,
    asJsonSafeString,
    buildGetEnvelope,
    getFormAndFiles,
    readBody
} from '../../httpbin-compat.js';
import {
    type JsonValue,
    errorMessage,
    writeErrorJson,
    writeJson
} from '../../util.js';

// Shared by every endpoint that ends with the /get response (delay, cache...)
export const handleGet: HttpHandler = (req, res, { url }) => {
    writeJson(res, buildGetEnvelope(req, url));
};

const handlePost: HttpHandler = async (req, res, { url }) => {
    const body = await readBody(req);
    const contentType = req.headers['content-type'];

    let json: JsonValue = null;
    if (contentType?.includes('json')) {
        try {
            json = JSON.parse(body.toString('utf8'));
        } catch (e) {
            writeErrorJson(res, 500, `failed to read body: ${errorMessage(e)}`);
            return;
        }
    }

    const envelope: PostEnvelope = {
        ...buildGetEnvelope(req, url),
        data: asJsonSafeString(body, contentType),
        ...getFormAndFiles(body, contentType),
        json
    };

    writeJson(res, envelope);
};

export const getMethodEndpoint: HttpEndpoint = {
    matchPath: (path) => path === '/get',
    methods: READ_METHODS,
    handle: handleGet,
    meta: {
        path: '/get',
        description: 'Returns the request headers, origin and query parameters. Repeated query parameters are returned as a list.',
        examples: ['/get', '/get?key=value&key=other'],
        group: httpRequestInspection
    }
};

export const postMethodEndpoint: HttpEndpoint = {
    matchPath: (path) => path === '/post',
    methods: ['POST'],
    handle: handlePost,
    meta: {
        path: '/post',
        description: 'Returns the request details, including the raw body, any form fields and files, and the parsed body for JSON content types.',
        group: httpRequestInspection
    }
};
