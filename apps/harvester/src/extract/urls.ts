const REJECTED_SCHEMES = ['mailto:', 'tel:', 'javascript:', 'data:']

/**
 * Resolve an href against the page URL. Null for fragment-only links,
 * links ending in "#", and non-web schemes.
 */
export function normalizeHref(raw: string | null | undefined, baseUrl: string): string | null {
  const href = (raw ?? '').trim()
  if (!href || href.startsWith('#') || href.endsWith('#')) {
    return null
  }
  const lower = href.toLowerCase()
  if (REJECTED_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
    return null
  }
  try {
    const resolved = new URL(href, baseUrl)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null
    }
    return resolved.toString()
  } catch {
    return null
  }
}

export function sameHost(url: string, baseUrl: string): boolean {
  try {
    return new URL(url).host.toLowerCase() === new URL(baseUrl).host.toLowerCase()
  } catch {
    return false
  }
}

function comparable(url: URL): string {
  return `${url.host.toLowerCase()}${url.pathname.replace(/\/+$/, '')}${url.search}`
}

/**
 * True for the site root and for the source page itself.
 */
export function isHomepage(url: string, sourceUrl: string): boolean {
  try {
    const target = new URL(url)
    if (target.pathname === '/' && !target.search) {
      return true
    }
    return comparable(target) === comparable(new URL(sourceUrl))
  } catch {
    return false
  }
}

export function urlPath(url: string): string {
  try {
    return new URL(url).pathname
  } catch {
    return ''
  }
}
