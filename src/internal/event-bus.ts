/**
 * Event Bus
 *
 * Typed publish/subscribe. A throwing handler is reported and does not stop
 * the remaining handlers.
 */

export type Unsubscribe = () => void

export type EventBus<Events extends Record<string, unknown>> = {
  on<K extends keyof Events>(event: K, handler: (payload: Events[K]) => void): Unsubscribe
  /** Returns false when at least one handler threw. */
  emit<K extends keyof Events>(event: K, payload: Events[K]): boolean
}

type HandlerSets<Events> = {
  [K in keyof Events]?: Set<(payload: Events[K]) => void>
}

export function createEventBus<Events extends Record<string, unknown>>(): EventBus<Events> {
  const handlers: HandlerSets<Events> = {}

  function on<K extends keyof Events>(event: K, handler: (payload: Events[K]) => void): Unsubscribe {
    const set = handlers[event] ?? new Set<(payload: Events[K]) => void>()
    handlers[event] = set
    set.add(handler)
    return () => {
      set.delete(handler)
    }
  }

  function emit<K extends keyof Events>(event: K, payload: Events[K]): boolean {
    const set = handlers[event]
    if (!set) return true
    let hadErrors = false
    for (const handler of [...set]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${String(event)}':`, e) }
    }
    return !hadErrors
  }

  return { on, emit }
}
