export type Listener = (...args: unknown[]) => void

export class SimpleEventEmitter {
  events: { [key: string]: Listener[] } = {}

  on(event: string, listener: Listener): () => void {
    if (!this.events[event]) {
      this.events[event] = []
    }
    this.events[event].push(listener)

    return () => {
      this.events[event] = this.events[event].filter((x) => x !== listener)
    }
  }

  emit(event: string, payload: unknown): void {
    for (const listener of this.events[event] ?? []) {
      listener(payload)
    }
    // wildcard listeners get the event name as well, used for debug logging
    for (const listener of this.events['*'] ?? []) {
      listener(event, payload)
    }
  }
}
