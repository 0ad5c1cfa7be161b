import { structuredPatch } from 'diff'
import { normalizeText } from './hash.js'

const CONTEXT_LINES = 3

/** Unified-diff convention: an empty range starts at the line before it. */
function rangeStart(start: number, length: number): number {
  return length === 0 ? Math.max(0, start - 1) : start
}

function withTrailingNewline(text: string): string {
  return text ? `${text}\n` : ''
}

/**
 * Unified diff of two texts after normalization, cut to `maxLines` lines.
 * A cut summary ends with "... (+N more)". Identical texts give ''.
 */
export function diffSummary(
  previous: string | null | undefined,
  current: string | null | undefined,
  maxLines = 12
): string {
  const before = normalizeText(previous)
  const after = normalizeText(current)
  if (before === after) return ''

  const patch = structuredPatch('previous', 'current', withTrailingNewline(before), withTrailingNewline(after), '', '', {
    context: CONTEXT_LINES,
  })

  const lines = ['--- previous', '+++ current']
  for (const hunk of patch.hunks) {
    lines.push(
      `@@ -${rangeStart(hunk.oldStart, hunk.oldLines)},${hunk.oldLines} +${rangeStart(hunk.newStart, hunk.newLines)},${hunk.newLines} @@`
    )
    lines.push(...hunk.lines.filter((line) => !line.startsWith('\\')))
  }

  if (lines.length <= maxLines) {
    return lines.join('\n')
  }
  return [...lines.slice(0, maxLines), `... (+${lines.length - maxLines} more)`].join('\n')
}
