export * from './types.js'
export { runExtractionChain } from './chain.js'
export { feedAttempt, feedItems, parseFeed, type FeedFormat, type FetchedBody, type ParsedFeed } from './feed.js'
export { extractHtml, htmlAttempt, type HtmlExtraction, type HtmlExtractOptions } from './html-extractor.js'
export { scanJsonLd, toStructuredNode, walkJsonLd } from './jsonld.js'
export { SITE_OVERRIDES, dateFromUrl, findSiteOverride, overrideAccepts, type DateOptions, type SiteOverride } from './overrides.js'
export { selectText } from './html.js'
export { cleanTitle, parseTextDate } from './text.js'
