import type { Action, AnyAction, InitAction, Reducer, Store, Thunk, Unsubscribe } from 'hearthjs-shared';

export const INIT_ACTION: InitAction = { type: '@@hearth/INIT' };

function isThunk<S, A extends Action>(
  input: A | Thunk<S, A, unknown>,
): input is Thunk<S, A, unknown> {
  return typeof input === 'function';
}

/**
 * Create a state container.
 *
 * The server creates one per request so no state leaks between requests;
 * the client creates one from the transferred snapshot. `dispatch` accepts
 * plain actions and thunks, so a loader can return
 * `store.dispatch(fetchStories())` and have its promise awaited.
 *
 * @example
 * ```ts
 * const store = createStore(reducer, window.__state);
 * store.dispatch({ type: 'stories/loaded', stories });
 * ```
 */
export function createStore<S, A extends Action = AnyAction>(
  reducer: Reducer<S, A>,
  preloadedState?: S,
): Store<S, A> {
  let currentReducer = reducer;
  let state: S | undefined = preloadedState;
  let listeners: Array<() => void> = [];
  let isReducing = false;

  function getState(): S {
    if (state === undefined) {
      throw new Error('Store has not been initialised.');
    }
    return state;
  }

  function reduce(action: A): void {
    if (isReducing) {
      throw new Error(`Reducers may not dispatch actions (received "${action.type}" while reducing).`);
    }
    try {
      isReducing = true;
      state = currentReducer(state, action);
    } finally {
      isReducing = false;
    }

    // Snapshot so (un)subscribing inside a listener affects only the next dispatch
    for (const listener of [...listeners]) {
      listener();
    }
  }

  function dispatch<T extends A>(action: T): T;
  function dispatch<R>(thunk: Thunk<S, A, R>): R;
  function dispatch(input: A | Thunk<S, A, unknown>): unknown {
    if (isThunk<S, A>(input)) {
      return input(dispatch, getState);
    }
    if (typeof input !== 'object' || input === null || typeof input.type !== 'string') {
      throw new Error(`Actions must be objects with a string "type" (received ${describe(input)}).`);
    }
    reduce(input);
    return input;
  }

  function subscribe(listener: () => void): Unsubscribe {
    listeners.push(listener);
    let subscribed = true;
    return () => {
      if (!subscribed) return;
      subscribed = false;
      listeners = listeners.filter((l) => l !== listener);
    };
  }

  function replaceReducer(nextReducer: Reducer<S, A>): void {
    currentReducer = nextReducer;
    state = currentReducer(state, INIT_ACTION);
  }

  state = currentReducer(state, INIT_ACTION);

  return { getState, dispatch, subscribe, replaceReducer };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return 'an object without a string type';
  return typeof value;
}
