/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import { EventEmitter as NodeEventEmitter } from 'node:events'

type EventMap<T> = { [K in keyof T]: unknown[] }

/**
 * Event emitter typed by an events interface (`{ event_name: [arg1, arg2] }`).
 */
export default class EventEmitter<Events extends EventMap<Events>> {
  private readonly emitter = new NodeEventEmitter()
  private readonly forwards: ((event: string, args: unknown[]) => void)[] = []

  on<E extends keyof Events & string>(event: E, listener: (...args: Events[E]) => void) {
    this.emitter.on(event, listener)
    return this
  }

  once<E extends keyof Events & string>(event: E, listener: (...args: Events[E]) => void) {
    this.emitter.once(event, listener)
    return this
  }

  off<E extends keyof Events & string>(event: E, listener: (...args: Events[E]) => void) {
    this.emitter.off(event, listener)
    return this
  }

  emit<E extends keyof Events & string>(event: E, ...args: Events[E]) {
    return this.dispatch(event, args)
  }

  /**
   * Re-emit every event of this emitter on `target`.
   * @param target An emitter listening to (at least) the same events.
   */
  forwardEvents<Target extends Events & EventMap<Target>>(target: EventEmitter<Target>) {
    this.forwards.push((event, args) => target.dispatch(event, args))
  }

  private dispatch(event: string, args: unknown[]): boolean {
    for (const forward of this.forwards) forward(event, args)
    return this.emitter.emit(event, ...args)
  }
}
