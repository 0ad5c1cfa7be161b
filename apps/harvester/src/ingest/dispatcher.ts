/**
 * Source dispatcher
 *
 * Static table of extraction strategies keyed by source type. A feed source
 * gets one fetch and a two-step chain: the feed parser, then the HTML
 * extractor over the same response.
 */

import { isSourceType, type SourceRecord, type SourceType } from '@regwatch/db'
import { UnsupportedSourceTypeError } from '../errors.js'
import { feedAttempt, htmlAttempt, runExtractionChain, type HtmlExtractOptions } from '../extract/index.js'
import type { FetchResponse } from '../fetch/index.js'
import type { ExtractorStrategy, IngestContext } from './types.js'

function htmlOptions(source: SourceRecord, response: FetchResponse, ctx: IngestContext): HtmlExtractOptions {
  return { baseUrl: response.url, sourceUrl: source.url, dates: ctx.dates }
}

const feedStrategy: ExtractorStrategy = {
  async extract(source, ctx) {
    const response = await ctx.fetcher.get(source.url, ctx.http)
    return runExtractionChain([feedAttempt(response), htmlAttempt(response.body, htmlOptions(source, response, ctx))])
  },
}

const htmlStrategy: ExtractorStrategy = {
  async extract(source, ctx) {
    const response = await ctx.fetcher.get(source.url, ctx.http)
    return runExtractionChain([htmlAttempt(response.body, htmlOptions(source, response, ctx))])
  },
}

export const EXTRACTORS: Readonly<Record<SourceType, ExtractorStrategy>> = Object.freeze({
  feed: feedStrategy,
  html: htmlStrategy,
})

/**
 * @throws UnsupportedSourceTypeError for types missing from EXTRACTORS
 */
export function resolveExtractor(type: string): ExtractorStrategy {
  if (!isSourceType(type)) {
    throw new UnsupportedSourceTypeError(type)
  }
  return EXTRACTORS[type]
}
