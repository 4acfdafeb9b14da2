import type { FlowEvent } from "../model/flow-event.model"

export type SubscriptionOptions = {
  /** Oldest events are dropped once this many are waiting to be read. */
  maxBuffered: number
  onClose: (subscription: Subscription) => void
  onOverflow: (subscription: Subscription, dropped: FlowEvent) => void
}

/** One live connection's queue of events, read one at a time with `next()`. */
export class Subscription {
  private readonly buffer: FlowEvent[] = []
  private waiter: ((event: FlowEvent | null) => void) | undefined
  private closed = false

  constructor(
    readonly id: string,
    readonly principal: string,
    private readonly opts: SubscriptionOptions,
  ) {}

  get isClosed(): boolean {
    return this.closed
  }

  push(event: FlowEvent): void {
    if (this.closed) return

    if (this.waiter) {
      const resolve = this.waiter
      this.waiter = undefined
      resolve(event)
      return
    }

    this.buffer.push(event)

    if (this.buffer.length > this.opts.maxBuffered) {
      const dropped = this.buffer.shift()
      if (dropped) this.opts.onOverflow(this, dropped)
    }
  }

  /** The next event, or null once the subscription is closed. */
  next(): Promise<FlowEvent | null> {
    const buffered = this.buffer.shift()
    if (buffered) return Promise.resolve(buffered)
    if (this.closed) return Promise.resolve(null)

    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  close(): void {
    if (this.closed) return

    this.closed = true
    this.buffer.length = 0
    this.waiter?.(null)
    this.waiter = undefined
    this.opts.onClose(this)
  }
}
