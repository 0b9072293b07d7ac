export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/** Minimal typed emitter; event names and payloads come from `Events`. */
export class EventEmitter<Events extends EventMap> {
  private events: { [K in keyof Events]?: Array<Listener<Events[K]>> } = {};

  public on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const listeners = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;
    for (const listener of [...listeners]) {
      listener(...args);
    }
    return true;
  }
}
