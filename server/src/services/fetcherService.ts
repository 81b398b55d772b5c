import { Client } from 'basic-ftp';
import { Writable } from 'stream';
import { FetchError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { FetchResult, FetchValidators, ProductType } from '../types';

const log = createLogger('FETCH');

export interface RawFetcher {
    /**
     * Retrieves the current payload of a product. Passing the validators of the
     * last successful fetch lets the source answer "not modified".
     */
    fetch(product: ProductType, conditional?: FetchValidators | null): Promise<FetchResult>;
}

export interface RawFetcherOptions {
    sources: Record<ProductType, string>;
    timeoutMs: number;
}

async function fetchHttp(
    product: ProductType,
    url: string,
    conditional: FetchValidators | null,
    timeoutMs: number
): Promise<FetchResult> {
    const headers: Record<string, string> = {};
    if (conditional?.etag) headers['If-None-Match'] = conditional.etag;
    if (conditional?.lastModified) headers['If-Modified-Since'] = conditional.lastModified;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
        const res = await fetch(url, { headers, signal: controller.signal });
        if (res.status === 304) {
            return { status: 'not-modified' };
        }
        if (!res.ok) {
            throw new FetchError(product, `HTTP ${res.status} ${res.statusText}`.trim(), res.status);
        }
        const body = await res.text();
        return {
            status: 'ok',
            body,
            etag: res.headers.get('etag'),
            lastModified: res.headers.get('last-modified'),
        };
    } catch (err) {
        if (err instanceof FetchError) throw err;
        if (controller.signal.aborted) {
            throw new FetchError(product, `timed out after ${timeoutMs}ms`, null, { cause: err });
        }
        throw new FetchError(product, `request failed: ${errorMessage(err)}`, null, { cause: err });
    } finally {
        clearTimeout(timeoutId);
    }
}

async function fetchFtp(
    product: ProductType,
    url: URL,
    conditional: FetchValidators | null,
    timeoutMs: number
): Promise<FetchResult> {
    const client = new Client(timeoutMs);
    const remotePath = decodeURIComponent(url.pathname);
    try {
        await client.access({
            host: url.hostname,
            port: url.port ? Number(url.port) : 21,
            user: decodeURIComponent(url.username) || 'anonymous',
            password: decodeURIComponent(url.password) || 'guest',
        });

        // MDTM is optional on FTP servers; without it every poll downloads the file
        let modified: Date | null = null;
        try {
            modified = await client.lastMod(remotePath);
        } catch (err) {
            log.info(`${product}: no modification time for ${remotePath} (${errorMessage(err)})`);
        }

        const previous = conditional?.lastModified ? Date.parse(conditional.lastModified) : NaN;
        if (modified && !Number.isNaN(previous) && modified.getTime() <= previous) {
            return { status: 'not-modified' };
        }

        const chunks: Buffer[] = [];
        const sink = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk);
                callback();
            },
        });
        await client.downloadTo(sink, remotePath);
        return {
            status: 'ok',
            body: Buffer.concat(chunks).toString('utf-8'),
            etag: null,
            lastModified: modified ? modified.toUTCString() : null,
        };
    } catch (err) {
        throw new FetchError(product, `FTP transfer failed: ${errorMessage(err)}`, null, { cause: err });
    } finally {
        client.close();
    }
}

export const createRawFetcher = (options: RawFetcherOptions): RawFetcher => ({
    async fetch(product, conditional = null) {
        const source = options.sources[product];
        let url: URL;
        try {
            url = new URL(source);
        } catch {
            throw new FetchError(product, `invalid source URL: ${source}`);
        }

        log.info(`Fetching ${product} from ${url.href}`);
        switch (url.protocol) {
            case 'http:':
            case 'https:':
                return fetchHttp(product, url.href, conditional, options.timeoutMs);
            case 'ftp:':
                return fetchFtp(product, url, conditional, options.timeoutMs);
            default:
                throw new FetchError(product, `unsupported protocol ${url.protocol}`);
        }
    },
});
