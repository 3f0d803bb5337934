import { MysqlUsageError } from './MysqlError'

export type ConnectionState =
  | 'closed'
  | 'connecting'
  | 'open'
  | 'executing'
  | 'fetching'

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  closed: ['connecting'],
  connecting: ['open', 'closed'],
  open: ['executing', 'closed'],
  executing: ['fetching', 'open', 'closed'],
  fetching: ['executing', 'open', 'closed'],
}

export class ConnectionStateMachine {
  private current: ConnectionState = 'closed'

  get state() {
    return this.current
  }

  is(...states: ConnectionState[]) {
    return states.includes(this.current)
  }

  assertIs(...states: ConnectionState[]) {
    if (!this.is(...states)) {
      throw new MysqlUsageError(
        `Unable to perform operation when connection state is ${this.current}`
      )
    }
  }

  transition(to: ConnectionState) {
    if (to === this.current) {
      return
    }
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new MysqlUsageError(
        `Invalid connection state transition from ${this.current} to ${to}`,
        'INVALID_STATE_TRANSITION'
      )
    }
    this.current = to
  }

  /** Closing is allowed from every state. */
  forceClosed() {
    this.current = 'closed'
  }
}
