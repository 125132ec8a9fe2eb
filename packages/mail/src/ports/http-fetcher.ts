export type HttpResponse = {
  body: Uint8Array
  contentType?: string
}

export interface HttpFetcher {
  /** GET the URL. Rejects on I/O failure or a non-2xx status. */
  get(url: URL): Promise<HttpResponse>
}
