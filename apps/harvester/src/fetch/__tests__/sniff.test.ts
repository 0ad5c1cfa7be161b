import { describe, it, expect } from 'vitest'
import { looksLikeHtml } from '../sniff.js'

describe('looksLikeHtml', () => {
  it('trusts an html content type', () => {
    expect(looksLikeHtml('text/html; charset=utf-8', '<?xml version="1.0"?><rss/>')).toBe(true)
  })

  it('sniffs a doctype or html tag in the first bytes', () => {
    expect(looksLikeHtml('application/xml', '\n  <!DOCTYPE html><html><body>Error</body></html>')).toBe(true)
    expect(looksLikeHtml(null, '<HTML lang="en">')).toBe(true)
  })

  it('ignores markup past the first 512 characters', () => {
    expect(looksLikeHtml('application/rss+xml', `<rss>${' '.repeat(600)}<html>`)).toBe(false)
  })

  it('passes a plain feed', () => {
    expect(looksLikeHtml('application/rss+xml', '<?xml version="1.0"?><rss version="2.0"></rss>')).toBe(false)
  })
})
