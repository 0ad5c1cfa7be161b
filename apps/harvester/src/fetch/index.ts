export * from './types.js'
export { createHttpClientConfig, DEFAULT_HTTP_CLIENT_CONFIG, type HttpClientConfigOverrides } from './config.js'
export { HttpFetcher, backoffDelay, getHttpFetcher, type HttpFetcherOptions } from './http-fetcher.js'
export { looksLikeHtml } from './sniff.js'
