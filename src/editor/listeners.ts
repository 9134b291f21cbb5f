/**
 * Typed listener registry.
 *
 * `on()` returns the function that removes the listener again, so callers
 * never have to keep a reference to the listener itself.
 *
 * @module listeners
 */

export type Unsubscribe = () => void;

export type Listener<T> = (payload: T) => void;

export type ListenerRegistry<Events extends Record<string, unknown>> = {
    on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): Unsubscribe;
    emit<E extends keyof Events>(event: E, payload: Events[E]): void;
    /** Number of listeners registered for `event` */
    count(event: keyof Events): number;
    clear(): void;
};

/**
 * Creates a listener registry for an event map.
 *
 * Listeners run synchronously in registration order. A listener added while
 * an event is being emitted is not called for that emission; one removed
 * during it is skipped if it has not run yet. Errors thrown by a listener
 * propagate to the emitter.
 *
 * @example
 * const events = createListenerRegistry<{ 'text-changed': string }>();
 * const off = events.on('text-changed', (text) => console.log(text));
 * events.emit('text-changed', 'hello');
 * off();
 */
export const createListenerRegistry = <Events extends Record<string, unknown>>(): ListenerRegistry<Events> => {
    type ListenerSets = { [E in keyof Events]?: Set<Listener<Events[E]>> };
    let listeners: ListenerSets = {};

    const getSet = <E extends keyof Events>(event: E): Set<Listener<Events[E]>> => {
        const existing = listeners[event];
        if (existing) {
            return existing;
        }
        const created = new Set<Listener<Events[E]>>();
        listeners[event] = created;
        return created;
    };

    return {
        clear: () => {
            listeners = {};
        },
        count: (event) => listeners[event]?.size ?? 0,
        emit: (event, payload) => {
            const set = listeners[event];
            if (!set) {
                return;
            }
            for (const listener of [...set]) {
                if (set.has(listener)) {
                    listener(payload);
                }
            }
        },
        on: (event, listener) => {
            const set = getSet(event);
            set.add(listener);
            return () => {
                set.delete(listener);
            };
        },
    };
};
