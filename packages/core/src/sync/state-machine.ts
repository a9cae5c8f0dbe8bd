/**
 * Sync pipeline stages and their legal transitions.
 */

import type { SyncStage } from './schemas.js'

const ACTIVE_STAGES: readonly SyncStage[] = ['FETCHING', 'CATEGORIZING', 'GENERATING', 'VECTORIZING']

const TRANSITIONS: Readonly<Record<SyncStage, readonly SyncStage[]>> = {
  IDLE: ['FETCHING'],
  FETCHING: ['CATEGORIZING', 'ERROR', 'IDLE'],
  CATEGORIZING: ['GENERATING', 'ERROR', 'IDLE'],
  GENERATING: ['VECTORIZING', 'ERROR', 'IDLE'],
  VECTORIZING: ['IDLE', 'ERROR'],
  ERROR: ['IDLE'],
}

export class IllegalTransitionError extends Error {
  constructor(readonly from: SyncStage, readonly to: SyncStage) {
    super(`Illegal sync transition ${from} -> ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

export function canTransition(from: SyncStage, to: SyncStage): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isActiveStage(stage: SyncStage): boolean {
  return ACTIVE_STAGES.includes(stage)
}

export class SyncStateMachine {
  private stage: SyncStage = 'IDLE'
  private listeners: Array<(from: SyncStage, to: SyncStage) => void> = []

  get current(): SyncStage {
    return this.stage
  }

  transition(to: SyncStage): void {
    const from = this.stage
    if (!canTransition(from, to)) throw new IllegalTransitionError(from, to)
    this.stage = to
    for (const listener of this.listeners) listener(from, to)
  }

  /** Cancellation or failure path: back to IDLE from wherever the run stopped. */
  settle(failed: boolean): void {
    if (this.stage === 'IDLE') return
    if (failed && this.stage !== 'ERROR') this.transition('ERROR')
    this.transition('IDLE')
  }

  onTransition(listener: (from: SyncStage, to: SyncStage) => void): () => void {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener)
    }
  }
}
