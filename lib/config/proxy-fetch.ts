/**
 * Proxy-aware fetch utility.
 *
 * Council APIs sometimes refuse requests from hosted CI runners. When the
 * PROXY_URL environment variable is set, requests are rewritten to
 * `PROXY_URL?url=<target>`; otherwise the request goes out directly.
 */

export type FetchFn = (url: string | URL, init?: RequestInit) => Promise<Response>;

export function proxyFetch(url: string | URL, init?: RequestInit): Promise<Response> {
    const urlStr = url.toString();
    const proxyUrl = process.env.PROXY_URL;
    if (!proxyUrl) {
        return fetch(urlStr, init);
    }

    const proxied = new URL(proxyUrl);
    proxied.searchParams.set("url", urlStr);
    return fetch(proxied.toString(), init);
}

/**
 * Wraps a fetch function so every request is aborted after `timeoutMs`.
 * An abort signal already present on `init` wins.
 */
export function withTimeout(fetchFn: FetchFn, timeoutMs: number): FetchFn {
    return (url, init) => fetchFn(url, { ...init, signal: init?.signal ?? AbortSignal.timeout(timeoutMs) });
}
