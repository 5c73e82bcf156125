import { StatusError } from '@httptoolkit/util';

import type { HttpEndpoint, HttpHandler, HttpResponse } from '../http-index.js';
import { httpStatusCodes } from '../groups.js';
import { isInformationalStatus, writeInformational } from '../../util.js';

const STATUS_PATTERN = /^\/status\/(\d+)$/;

const REDIRECT_STATUSES = [301, 302, 303, 305, 307];

const NOT_ACCEPTABLE_BODY = '{"message": "Client did not request a supported media type.", ' +
    '"accept": ["image/webp", "image/svg+xml", "image/jpeg", "image/png", "image/*"]}';

const TEAPOT_BODY = `
    -=[ teapot ]=-

       _...._
     .'  _ _ '.
    | ."  ^  ". _,
    \\_;'"---"'|//
      |       ;/
      \\_     _/
        '"""'
`;

// The fixed responses HTTPBin sends for a few special codes. Everything else is an empty body.
const writeStatusResponse = (res: HttpResponse, statusCode: number) => {
    if (isInformationalStatus(statusCode)) {
        writeInformational(res, statusCode);
        res.writeHead(200).end();
    } else if (REDIRECT_STATUSES.includes(statusCode)) {
        res.writeHead(statusCode, { location: '/redirect/1' }).end();
    } else if (statusCode === 401) {
        res.writeHead(statusCode, {
            'www-authenticate': 'Basic realm="Fake Realm"'
        }).end();
    } else if (statusCode === 402) {
        res.writeHead(statusCode, {
            'x-more-info': 'http://vimeo.com/22053820'
        }).end('Fuck you, pay me!');
    } else if (statusCode === 406) {
        res.writeHead(statusCode, {
            'content-type': 'application/json'
        }).end(NOT_ACCEPTABLE_BODY);
    } else if (statusCode === 418) {
        res.writeHead(statusCode, {
            'x-more-info': 'http://tools.ietf.org/html/rfc2324'
        }).end(TEAPOT_BODY);
    } else {
        res.writeHead(statusCode).end();
    }
};

const handle: HttpHandler = (_req, res, { path }) => {
    const rawCode = STATUS_PATTERN.exec(path)?.[1] ?? '';
    const statusCode = parseInt(rawCode, 10);

    // Unregistered codes like 777 are fine, but a status line needs exactly 3 digits,
    // and a 101 can't be sent without an upgrade request
    if (isNaN(statusCode) || statusCode < 100 || statusCode > 999 || statusCode === 101) {
        throw new StatusError(400, `Invalid status code ${rawCode}`);
    }

    writeStatusResponse(res, statusCode);
}

export const status: HttpEndpoint = {
    matchPath: (path) => STATUS_PATTERN.test(path),
    handle,
    meta: {
        path: '/status/{code}',
        description: 'Returns the given status code, for any method. 1xx codes are sent as interim responses before an empty 200, 3xx codes redirect to /redirect/1, and 401, 402, 406 & 418 include their HTTPBin headers and bodies.',
        examples: ['/status/404', '/status/418', '/status/777'],
        group: httpStatusCodes
    }
};
