import type { HttpEndpoint, HttpHandler, HttpResponse } from '../http-index.js';
import { READ_METHODS } from '../http-methods.js';
import { httpAuthentication } from '../groups.js';
import { writeJson } from '../../util.js';

const BASIC_AUTH_PATTERN = /^\/basic-auth\/([^\/]+)\/([^\/]+)$/;
const HIDDEN_BASIC_AUTH_PATTERN = /^\/hidden-basic-auth\/([^\/]+)\/([^\/]+)$/;

const decodePathSegment = (segment: string) => {
    try {
        return decodeURIComponent(segment);
    } catch (e) {
        return segment; // Malformed escapes are compared literally
    }
};

const parseBasicAuthHeader = (authHeader: string | undefined) => {
    const match = authHeader?.match(/^basic (.*)$/i);
    if (!match) return undefined;

    const decoded = Buffer.from(match[1], 'base64').toString('utf8');
    const separatorIndex = decoded.indexOf(':');
    if (separatorIndex === -1) return undefined;

    return {
        username: decoded.slice(0, separatorIndex),
        password: decoded.slice(separatorIndex + 1)
    };
};

const buildBasicAuthHandler = (
    pathPattern: RegExp,
    rejectRequest: (res: HttpResponse) => void
): HttpHandler => (req, res, { path }) => {
    const [username, password] = (pathPattern.exec(path)?.slice(1) ?? [])
        .map(decodePathSegment);

    const credentials = parseBasicAuthHeader(req.headers['authorization']);
    if (
        !credentials ||
        credentials.username !== username ||
        credentials.password !== password
    ) {
        rejectRequest(res);
        return;
    }

    writeJson(res, {
        authenticated: true,
        user: username
    });
};

export const basicAuth: HttpEndpoint = {
    matchPath: (path) => BASIC_AUTH_PATTERN.test(path),
    methods: READ_METHODS,
    handle: buildBasicAuthHandler(BASIC_AUTH_PATTERN, (res) => {
        res.writeHead(401, {
            'www-authenticate': 'Basic realm="Fake Realm"'
        }).end();
    }),
    meta: {
        path: '/basic-auth/{username}/{password}',
        description: 'Requires HTTP Basic authentication with the given credentials, returning 401 otherwise.',
        examples: ['/basic-auth/user/passwd'],
        group: httpAuthentication
    }
};

export const hiddenBasicAuth: HttpEndpoint = {
    matchPath: (path) => HIDDEN_BASIC_AUTH_PATTERN.test(path),
    methods: READ_METHODS,
    // Bare 404, with no challenge
    handle: buildBasicAuthHandler(HIDDEN_BASIC_AUTH_PATTERN, (res) => {
        res.writeHead(404).end();
    }),
    meta: {
        path: '/hidden-basic-auth/{username}/{password}',
        description: 'Requires HTTP Basic authentication with the given credentials, returning 404 otherwise.',
        examples: ['/hidden-basic-auth/user/passwd'],
        group: httpAuthentication
    }
};
