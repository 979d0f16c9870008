/**
 * Runtime lifecycle as a robot3 state machine:
 *
 *   idle --start--> activated --dispatch--> dispatching --done--> activated
 *   activated | dispatching --dispose--> disposed
 */

import { createMachine, interpret, state, transition } from 'robot3'
import { getLogger } from './config'

type LifecycleState = 'idle' | 'activated' | 'dispatching' | 'disposed'

type LifecycleEvent = 'start' | 'dispatch' | 'done' | 'dispose'

const lifecycleMachine = createMachine('idle', {
  idle: state(transition('start', 'activated'), transition('dispose', 'disposed')),
  activated: state(transition('dispatch', 'dispatching'), transition('dispose', 'disposed')),
  dispatching: state(transition('done', 'activated'), transition('dispose', 'disposed')),
  disposed: state()
})

const LIFECYCLE_STATES: readonly LifecycleState[] = ['idle', 'activated', 'dispatching', 'disposed']

function toLifecycleState(name: unknown): LifecycleState {
  const known = LIFECYCLE_STATES.find(candidate => candidate === name)
  if (!known) throw new Error(`Unknown lifecycle state: ${String(name)}`)
  return known
}

class Lifecycle {
  private readonly service

  constructor(label: string) {
    this.service = interpret(lifecycleMachine, service => {
      getLogger().debug(`${label}: ${String(service.machine.current)}`)
    })
  }

  get state(): LifecycleState {
    return toLifecycleState(this.service.machine.current)
  }

  send(event: LifecycleEvent): void {
    this.service.send(event)
  }
}

export { Lifecycle }
export type { LifecycleState, LifecycleEvent }
