import { type IdGenerator, uuidV4 } from "@featurekit/id"
import type { Logger } from "@featurekit/logger"
import type { FlowEvent } from "../model/flow-event.model"
import type { NotificationEmitter } from "./notification-emitter"
import { Subscription } from "./subscription"

export type NotificationHubDeps = {
  logger: Logger

  /** @default uuidV4 */
  ids?: IdGenerator
}

export type NotificationHubOptions = {
  maxBufferedEvents: number
}

/** In-memory fan-out of events to every open subscription of a principal. */
export class NotificationHub implements NotificationEmitter {
  private readonly subscriptions = new Map<string, Set<Subscription>>()
  private readonly logger: Logger
  private readonly ids: IdGenerator
  private closed = false

  constructor(
    deps: NotificationHubDeps,
    private readonly opts: NotificationHubOptions = { maxBufferedEvents: 100 },
  ) {
    this.logger = deps.logger.child({ module: "notification-hub" })
    this.ids = deps.ids ?? uuidV4
  }

  /** A closed hub hands out subscriptions that are already closed. */
  subscribe(principal: string): Subscription {
    const subscription = new Subscription(this.ids.generate(), principal, {
      maxBuffered: this.opts.maxBufferedEvents,
      onClose: (sub) => this.remove(sub),
      onOverflow: (sub, dropped) =>
        this.logger.warn("Subscription buffer full, dropping oldest event", {
          principal: sub.principal,
          subscriptionId: sub.id,
          action: dropped.action,
        }),
    })

    if (this.closed) {
      subscription.close()
      return subscription
    }

    const existing = this.subscriptions.get(principal)
    if (existing) existing.add(subscription)
    else this.subscriptions.set(principal, new Set([subscription]))

    this.logger.debug("Subscription opened", { principal, subscriptionId: subscription.id })

    return subscription
  }

  emit(principal: string, event: FlowEvent): void {
    const subs = this.subscriptions.get(principal)

    if (!subs || subs.size === 0) {
      this.logger.debug("No live subscription, dropping event", {
        principal,
        action: event.action,
      })
      return
    }

    for (const sub of subs) {
      sub.push(event)
    }
  }

  subscriberCount(principal: string): number {
    return this.subscriptions.get(principal)?.size ?? 0
  }

  /** Closes every subscription; later subscriptions close immediately. */
  close(): void {
    this.closed = true

    for (const subs of [...this.subscriptions.values()]) {
      for (const sub of [...subs]) {
        sub.close()
      }
    }

    this.subscriptions.clear()
  }

  private remove(subscription: Subscription): void {
    const subs = this.subscriptions.get(subscription.principal)
    if (!subs) return

    subs.delete(subscription)
    if (subs.size === 0) this.subscriptions.delete(subscription.principal)

    this.logger.debug("Subscription closed", {
      principal: subscription.principal,
      subscriptionId: subscription.id,
    })
  }
}
