import { CurseCounter } from './curse-counter'
import { ValueQueue } from './queue'
import { StackBank } from './stack-bank'

/**
 * Mutable machine state owned by exactly one run
 */
export interface MachineState {
  readonly stacks: StackBank
  readonly queue: ValueQueue
  readonly curses: CurseCounter
}

export interface MachineSnapshot {
  stacks: Record<number, string[]>
  queue: string[]
  curses: bigint
}

export function createMachineState(): MachineState {
  return {
    stacks: new StackBank(),
    queue: new ValueQueue(),
    curses: new CurseCounter(),
  }
}

export function snapshotMachineState(state: MachineState): MachineSnapshot {
  return {
    stacks: state.stacks.snapshot(),
    queue: state.queue.snapshot(),
    curses: state.curses.value,
  }
}
