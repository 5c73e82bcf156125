import * as http from 'http';
import { delay } from '@httptoolkit/util';

export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };

export interface ErrorEnvelope {
    error: { message: string };
}

export const serializeJson = (json: unknown) =>
    JSON.stringify(json, null, 2) + '\n';

export const errorMessage = (e: unknown) =>
    e instanceof Error ? e.message : String(e);

export function writeErrorJson(
    res: http.ServerResponse,
    statusCode: number,
    message: string
) {
    const envelope: ErrorEnvelope = { error: { message } };
    try {
        res.writeHead(statusCode, { 'content-type': 'application/json' });
        res.end(serializeJson(envelope));
    } catch (e) {
        // Nothing else can be sent on this response at this point
        console.error('Failed to write error response', e);
    }
}

/**
 * Writes a JSON response body. If the value can't be serialized, a 500
 * error envelope is written instead.
 */
export function writeJson(
    res: http.ServerResponse,
    value: unknown,
    headers: http.OutgoingHttpHeaders = {}
) {
    let body: string;
    try {
        body = serializeJson(value);
    } catch (e) {
        writeErrorJson(res, 500, `failed to write json: ${errorMessage(e)}`);
        return;
    }

    res.writeHead(200, {
        'content-type': 'application/json',
        ...headers
    });
    res.end(body);
}


// Timers overflow past 2^31-1 ms, so waits are taken in slices
const SLEEP_SLICE_MS = 1000;

/**
 * Waits for the given duration, or until the response is closed. Resolves true only if the
 * whole duration passed with the response still open.
 */
export async function sleepWhileOpen(res: http.ServerResponse, durationMs: number): Promise<boolean> {
    const endTime = Date.now() + durationMs;
    while (!res.destroyed) {
        const remainingMs = endTime - Date.now();
        if (remainingMs <= 0) return true;
        await delay(Math.min(remainingMs, SLEEP_SLICE_MS));
    }
    return false;
}

export const isInformationalStatus = (statusCode: number) =>
    statusCode >= 100 && statusCode < 200;

/**
 * Sends a 1xx interim response. Node never sends these as a final response, so a
 * real response must still follow.
 */
export function writeInformational(res: http.ServerResponse, statusCode: number) {
    if (statusCode === 100) {
        res.writeContinue();
    } else if (statusCode === 102) {
        res.writeProcessing();
    } else {
        const reason = http.STATUS_CODES[statusCode] ?? 'Informational';
        res.socket?.write(`HTTP/1.1 ${statusCode} ${reason}\r\n\r\n`);
    }
}
