/** Maps each event name to the arguments its listeners receive. */
export type EventMap = Record<string, unknown[]>;

export type Listener<Args extends unknown[]> = (...args: Args) => void;

type StoredListener = (...args: never) => unknown;

export class EventEmitter<Events extends EventMap> {
  private events = new Map<keyof Events, StoredListener[]>();

  public on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners = this.events.get(event) ?? [];
    listeners.push(listener);
    this.events.set(event, listeners);
    return this;
  }

  public off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners = this.events.get(event);
    if (!listeners) return this;
    const index = listeners.indexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }
    if (listeners.length === 0) {
      this.events.delete(event);
    }
    return this;
  }

  public once<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const onceWrapper: Listener<Events[E]> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  public emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const listeners = this.events.get(event);
    if (!listeners) return false;
    for (const listener of [...listeners]) {
      Reflect.apply(listener, this, args);
    }
    return true;
  }

  public removeAllListeners(event?: keyof Events): this {
    if (event !== undefined) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
    return this;
  }

  public listenerCount(event: keyof Events): number {
    return this.events.get(event)?.length ?? 0;
  }
}
