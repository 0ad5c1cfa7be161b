export type SafeJsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
