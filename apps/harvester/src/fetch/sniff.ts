const SNIFF_LENGTH = 512

/**
 * True when a response is an HTML page rather than a feed: the
 * content-type mentions html, or the opening bytes carry an html tag or
 * doctype.
 */
export function looksLikeHtml(contentType: string | null | undefined, body: string): boolean {
  if (contentType && contentType.toLowerCase().includes('html')) {
    return true
  }
  const head = body.slice(0, SNIFF_LENGTH).toLowerCase()
  return head.includes('<html') || head.includes('<!doctype html')
}
