import { logger } from '@cursevm/core'
import type { Curse, CurseKind } from '@cursevm/types'

/**
 * Curse Counter
 *
 * Counts recoverable faults for one run. Only ever grows, by exactly one per
 * curse. Also keeps a tally per curse kind for diagnostics.
 */
export class CurseCounter {
  private total = 0n
  private readonly tally = new Map<CurseKind, bigint>()

  get value(): bigint {
    return this.total
  }

  raise(curse: Curse): void {
    this.total += 1n
    this.tally.set(curse.kind, (this.tally.get(curse.kind) ?? 0n) + 1n)

    logger.debug('Curse raised', {
      kind: curse.kind,
      total: this.total.toString(),
      ...curse.details,
    })
  }

  countOf(kind: CurseKind): bigint {
    return this.tally.get(kind) ?? 0n
  }

  /** Non-zero tallies, keyed by kind */
  summary(): Partial<Record<CurseKind, bigint>> {
    return Object.fromEntries(this.tally)
  }
}
