import _ from 'lodash';
import * as http from 'http';
import * as streamConsumers from 'stream/consumers';

import * as Cookie from 'cookie';
import * as multipart from 'parse-multipart-data';

import type { JsonValue } from './util.js';

// Matches Flask's multi-dict values: a scalar for keys seen once, a list otherwise
export type FlatValues = { [key: string]: string | Array<string> };

export interface OriginFragment {
    origin: string;
}

export interface HeadersFragment {
    headers: { [name: string]: string };
}

export type GetEnvelope = HeadersFragment & OriginFragment & {
    args: FlatValues;
};

export type PostEnvelope = GetEnvelope & {
    data: string;
    files: FlatValues;
    form: FlatValues;
    json: JsonValue;
};

const utf8Decoder = new TextDecoder('utf8', { fatal: true });

// Matches json_safe in httpbin
export const asJsonSafeString = (data: Buffer, contentType: string = 'application/octet-stream') => {
    try {
        return utf8Decoder.decode(data);
    } catch (e) {
        return `data:${
            contentType
        };base64,${
            data.toString('base64')
        }`
    }
}

export const entriesToMultidict = (entries: Array<[string, string]>) =>
    entries.reduce<FlatValues>((result, [k, v]) => {
        const currentValue = result[k];
        if (currentValue === undefined) {
            result[k] = v;
        } else if (Array.isArray(currentValue)) {
            currentValue.push(v);
        } else {
            result[k] = [currentValue, v];
        }

        return result;
    }, {});

export const getUrlArgs = (url: URL) => entriesToMultidict([...url.searchParams.entries()]);

export const getOrigin = (req: http.IncomingMessage) =>
    req.socket.remoteAddress?.replace(/^::ffff:/, '') // Drop IPv6 wrapper of IPv4 addresses
        ?? '';

const canonicalHeaderName = (name: string) =>
    name.split('-').map(part =>
        part.charAt(0).toUpperCase() + part.slice(1)
    ).join('-');

// First value only for repeated headers, with Title-Case names
export const getHeaders = (req: http.IncomingMessage): { [name: string]: string } => {
    const pairs: Array<[string, string]> = [];
    for (const [name, values] of Object.entries(req.headersDistinct)) {
        if (!values?.length) continue;
        pairs.push([canonicalHeaderName(name), values[0]]);
    }
    return _.fromPairs(_.sortBy(pairs, ([name]) => name));
};

// Cookie names must be RFC 7230 tokens
const COOKIE_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export const isValidCookieName = (name: string) => COOKIE_NAME_PATTERN.test(name);

// Cookie.parse keeps the first of any duplicated names, but the last value should win here
export const getCookies = (req: http.IncomingMessage) =>
    (req.headers.cookie ?? '').split(';').reduce<{ [name: string]: string }>((cookies, pair) => {
        for (const [name, value] of Object.entries(Cookie.parse(pair))) {
            if (value !== undefined) cookies[name] = value;
        }
        return cookies;
    }, {});

export const originFragment = (req: http.IncomingMessage): OriginFragment => ({
    origin: getOrigin(req)
});

export const headersFragment = (req: http.IncomingMessage): HeadersFragment => ({
    headers: getHeaders(req)
});

export const buildGetEnvelope = (req: http.IncomingMessage, url: URL): GetEnvelope => ({
    ...headersFragment(req),
    ...originFragment(req),
    args: getUrlArgs(url)
});

export const readBody = (req: http.IncomingMessage) =>
    streamConsumers.buffer(req); // Wait for all request data

const getMultipartBoundary = (contentType: string | undefined) => {
    if (!contentType?.includes('multipart/form-data')) return undefined;

    // https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Type#boundary
    const boundary = contentType.match(/;\s*boundary=("?)([^";]+)\1/);
    return boundary?.[2];
}

/**
 * Splits a request body into form fields and uploaded files. Urlencoded bodies only have
 * fields, multipart parts are files when they carry a filename.
 */
export function getFormAndFiles(body: Buffer, contentType: string | undefined): {
    form: FlatValues,
    files: FlatValues
} {
    if (contentType?.startsWith('application/x-www-form-urlencoded')) {
        return {
            form: entriesToMultidict([...new URLSearchParams(body.toString('utf8')).entries()]),
            files: {}
        };
    }

    const boundary = getMultipartBoundary(contentType);
    if (!boundary) return { form: {}, files: {} };

    const [fileParts, fieldParts] = _.partition(
        multipart.parse(body, boundary),
        (part) => part.filename !== undefined
    );

    return {
        form: entriesToMultidict(fieldParts.map((part) =>
            [part.name ?? '', asJsonSafeString(part.data, part.type)]
        )),
        files: entriesToMultidict(fileParts.map((part) =>
            [part.name ?? '', asJsonSafeString(part.data, part.type)]
        ))
    };
}
