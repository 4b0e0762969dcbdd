import { Rational } from '@cursevm/rational'
import type { Faultable } from '@cursevm/types'

/**
 * Value Queue
 *
 * Single FIFO shared by every instruction of a run. Dequeuing from an empty
 * queue yields 0/1 with an empty-queue curse.
 */
export class ValueQueue {
  private items: Rational[] = []
  private head = 0

  get size(): number {
    return this.items.length - this.head
  }

  enqueue(value: Rational): void {
    this.items.push(value)
  }

  dequeue(): Faultable<Rational> {
    const value = this.items[this.head]
    if (value === undefined) {
      return [Rational.ZERO, { kind: 'empty-queue' }]
    }
    this.head += 1
    // compact once the consumed prefix dominates
    if (this.head > 32 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return [value, null]
  }

  /** Front to back, as text */
  snapshot(): string[] {
    return this.items.slice(this.head).map((value) => value.toString())
  }
}
