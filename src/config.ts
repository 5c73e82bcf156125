import _ from 'lodash';

/**
 * Tunables shared by every handler of one server instance.
 */
export interface HttpBinConfig {
    /** Upper bound for /delay/{n} sleeps */
    delayMaxMs: number;
    /** Pause before each line written by /stream/{n} */
    streamIntervalMs: number;
    /** Buffer size used when generating /bytes/{n} output */
    binaryChunkSize: number;
}

export const DEFAULT_CONFIG: Readonly<HttpBinConfig> = {
    delayMaxMs: 10_000,
    streamIntervalMs: 1_000,
    binaryChunkSize: 64 * 1024
};

export const buildConfig = (overrides: Partial<HttpBinConfig> = {}): HttpBinConfig => ({
    ...DEFAULT_CONFIG,
    ..._.omitBy(overrides, _.isUndefined)
});

export interface ListenAddress {
    host: string | undefined;
    port: number;
}

const LISTEN_ADDRESS_PATTERN = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/;

// Accepts host:port, :port and [ipv6]:port. An empty host listens on all interfaces.
export function parseListenAddress(address: string): ListenAddress {
    const match = LISTEN_ADDRESS_PATTERN.exec(address.trim());
    if (!match) {
        throw new Error(`Invalid listen address '${address}', expected host:port`);
    }

    const host = match[1] ?? match[2];
    const port = parseInt(match[3], 10);
    if (port > 65535) {
        throw new Error(`Invalid port in listen address '${address}'`);
    }

    return {
        host: host || undefined,
        port
    };
}
