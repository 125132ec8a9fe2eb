import type { HttpFetcher, HttpResponse } from "../../ports/http-fetcher"

export type FetchHttpFetcherDeps = {
  fetch?: typeof fetch
}

export type FetchHttpFetcherOptions = {
  timeoutMs?: number
}

/**
 * `HttpFetcher` on the global `fetch`.
 */
export class FetchHttpFetcher implements HttpFetcher {
  constructor(
    private readonly deps: FetchHttpFetcherDeps = {},
    private readonly opts: FetchHttpFetcherOptions = {},
  ) {}

  async get(url: URL): Promise<HttpResponse> {
    const doFetch = this.deps.fetch ?? fetch

    const response = await doFetch(url, {
      method: "GET",
      redirect: "follow",
      ...(this.opts.timeoutMs !== undefined && {
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      }),
    })

    if (!response.ok) {
      throw new Error(`GET ${url.href} failed with status ${response.status}`)
    }

    const contentType = response.headers.get("content-type")

    return {
      body: new Uint8Array(await response.arrayBuffer()),
      ...(contentType && { contentType }),
    }
  }
}
