/**
 * Tiny type-safe event bus over EventTarget.
 *
 * Consumers describe their events as a map of name → payload (`void` for none)
 * and get checked `on`/`once`/`off`/`emit` signatures. Listeners run
 * synchronously in registration order; a listener that returns a promise is
 * not awaited, and a rejection is routed to the bus's `onError` hook.
 */

export type EventMap = Record<string, unknown>;

type DomHandler = (ev: Event) => void;

class BusEvent<D> extends Event {
  constructor(type: string, readonly detail: D) {
    super(type);
  }
}

export function eventBus<M extends EventMap>(
  init?: { onError?: (error: unknown, type: string) => void },
) {
  type Key = Extract<keyof M, string>;
  type Detail<K extends Key> = M[K];
  type Args<K extends Key> = Detail<K> extends void ? [] : [Detail<K>];
  type Listener<K extends Key> = (...args: Args<K>) => void | Promise<void>;

  const target = new EventTarget();
  const listenerMap = new Map<string, Map<unknown, DomHandler>>();
  const muted = new Set<Key>();
  const onError = init?.onError ??
    ((error: unknown, type: string) =>
      console.error(`[event-bus] listener for "${type}" failed`, error));

  const ensureMap = (type: Key) => {
    let map = listenerMap.get(type);
    if (!map) {
      map = new Map();
      listenerMap.set(type, map);
    }
    return map;
  };

  const toDomHandler = <K extends Key>(
    type: K,
    listener: Listener<K>,
    once: boolean,
  ): DomHandler => {
    return (ev) => {
      if (once) listenerMap.get(type)?.delete(listener);
      const detail = ev instanceof BusEvent ? ev.detail : undefined;
      const args = (detail === undefined ? [] : [detail]) as Args<K>;
      try {
        const result = listener(...args);
        if (result instanceof Promise) {
          result.catch((error: unknown) => onError(error, type));
        }
      } catch (error) {
        onError(error, type);
      }
    };
  };

  const subscribe = <K extends Key>(
    type: K,
    listener: Listener<K>,
    once: boolean,
  ) => {
    const map = ensureMap(type);
    if (!map.has(listener)) {
      const h = toDomHandler(type, listener, once);
      map.set(listener, h);
      target.addEventListener(type, h, { once });
    }
    return () => api.off(type, listener);
  };

  const api = {
    on<K extends Key>(type: K, listener: Listener<K>) {
      return subscribe(type, listener, false);
    },

    once<K extends Key>(type: K, listener: Listener<K>) {
      return subscribe(type, listener, true);
    },

    off<K extends Key>(type: K, listener: Listener<K>) {
      const map = listenerMap.get(type);
      const h = map?.get(listener);
      if (map && h) {
        target.removeEventListener(type, h);
        map.delete(listener);
        if (map.size === 0) listenerMap.delete(type);
      }
    },

    emit<K extends Key>(type: K, ...detail: Args<K>) {
      if (muted.has(type)) return false;
      const d = (detail.length ? detail[0] : undefined) as Detail<K>;
      return target.dispatchEvent(new BusEvent(type, d));
    },

    listenerCount<K extends Key>(type: K) {
      return listenerMap.get(type)?.size ?? 0;
    },

    mute<K extends Key>(type: K) {
      muted.add(type);
    },

    unmute<K extends Key>(type: K) {
      muted.delete(type);
    },
  } as const;

  return api;
}

export type EventBus<M extends EventMap> = ReturnType<typeof eventBus<M>>;
