import type { ChainResult, ExtractionAttempt, ExtractionOutcome } from './types.js'

/**
 * Run attempts in order until one yields items or an unrecoverable
 * outcome. Each attempt runs at most once; an `empty` outcome stops the
 * chain, a recoverable error moves to the next attempt. A thrown error is
 * recorded as unrecoverable.
 */
export async function runExtractionChain(attempts: readonly ExtractionAttempt[]): Promise<ChainResult> {
  const trail: ChainResult['trail'] = []
  let outcome: ExtractionOutcome | null = null

  for (const attempt of attempts) {
    try {
      outcome = await attempt.run()
    } catch (error) {
      outcome = {
        kind: 'error',
        strategy: attempt.name,
        error: error instanceof Error ? error : new Error(String(error)),
        recoverable: false,
      }
    }
    trail.push({ strategy: attempt.name, kind: outcome.kind })

    if (outcome.kind !== 'error' || !outcome.recoverable) {
      break
    }
  }

  if (!outcome) {
    throw new Error('Extraction chain needs at least one attempt')
  }
  return { outcome, trail }
}
