import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Text of an HTML fragment with adjacent text nodes separated by a space,
 * whitespace collapsed.
 */
export function spacedText(fragment: string | null): string {
  const $ = cheerio.load(fragment ?? '', null, false)
  $('*').before(' ').after(' ')
  return $.root().text().replace(/\s+/g, ' ').trim()
}

const NON_CONTENT = 'script, style, noscript, iframe, nav, header, footer'

/**
 * Visible text of every node matching `selector`, one node per line, with
 * scripts and page chrome stripped. Without a selector, or when it matches
 * nothing, the whole document's text.
 */
export function selectText(payload: string, selector?: string | null): string {
  const $ = loadHtml(payload)
  $(NON_CONTENT).remove()
  const nodes = selector ? $(selector).toArray() : []
  if (nodes.length === 0) {
    return $.root().text().replace(/\s+/g, ' ').trim()
  }
  return nodes
    .map((node) => $(node).text().replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n')
}
