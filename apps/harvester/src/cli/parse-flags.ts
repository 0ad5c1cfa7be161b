export type Flags = Record<string, string | boolean>

/**
 * `--key value words` → { key: 'value words' }; a bare `--key` is `true`.
 * Positional tokens before the first flag are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      // Repeated flags accumulate: --state tx --state co
      const previous = flags[key]
      const value = valueTokens.join(' ')
      flags[key] = typeof previous === 'string' ? `${previous} ${value}` : value
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

export function asNumber(value: string | boolean | undefined): number | undefined {
  if (typeof value !== 'string') {
    return undefined
  }
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : undefined
}

/** Splits on whitespace and commas: `--state tx,co ca` → ['tx', 'co', 'ca']. */
export function asList(value: string | boolean | undefined): string[] {
  if (typeof value !== 'string') {
    return []
  }
  return value.split(/[\s,]+/).filter((part) => part.length > 0)
}
