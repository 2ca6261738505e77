import { errorMessage, log } from "../logger.js";

type Listener<T> = (payload: T) => void;

/**
 * Named listener lists. A listener that throws is logged and skipped so one
 * bad subscriber cannot break delivery to the rest or to the caller.
 */
export class ListenerRegistry<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  constructor(private readonly source: string) {}

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const set: Set<Listener<Events[K]>> = this.listeners[event] ?? new Set();
    this.listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]) {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (err) {
        log({
          level: "error",
          msg: "listener_failed",
          source: this.source,
          event: String(event),
          error: errorMessage(err)
        });
      }
    }
  }

  clear() {
    this.listeners = {};
  }
}
