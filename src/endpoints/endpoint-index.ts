import * as httpIndex from './http-index.js';

const isHttpEndpoint = (value: unknown): value is httpIndex.HttpEndpoint =>
    typeof value === 'object' &&
    value !== null &&
    'matchPath' in value &&
    'handle' in value;

export const httpEndpoints: Array<httpIndex.HttpEndpoint & { name: string }> = Object.entries(httpIndex)
    .filter((entry): entry is [string, httpIndex.HttpEndpoint] => isHttpEndpoint(entry[1]))
    .map(([key, value]) => ({ ...value, name: key }));
