import { describe, it, expect, vi } from 'vitest';
import type { Reducer, Store } from 'hearthjs-shared';
import { createStore, INIT_ACTION } from '../store.js';

interface CounterState {
  count: number;
}

type CounterAction =
  | { type: 'inc' }
  | { type: 'add'; amount: number }
  | { type: 'nested' };

let nestedTarget: Store<CounterState, CounterAction> | null = null;

const counter: Reducer<CounterState, CounterAction> = (state = { count: 0 }, action) => {
  switch (action.type) {
    case 'inc':
      return { count: state.count + 1 };
    case 'add':
      return { count: state.count + action.amount };
    case 'nested':
      nestedTarget?.dispatch({ type: 'inc' });
      return state;
    default:
      return state;
  }
};

describe('createStore', () => {
  it('initialises state from the reducer default', () => {
    expect(createStore(counter).getState()).toEqual({ count: 0 });
  });

  it('starts from preloaded state', () => {
    expect(createStore(counter, { count: 5 }).getState()).toEqual({ count: 5 });
  });

  it('sends the init action to the reducer once on creation', () => {
    const reducer = vi.fn(counter);
    createStore<CounterState, CounterAction>(reducer);
    expect(reducer).toHaveBeenCalledOnce();
    expect(reducer).toHaveBeenCalledWith(undefined, INIT_ACTION);
  });

  it('reduces dispatched actions and returns them', () => {
    const store = createStore(counter);
    const action = store.dispatch({ type: 'add', amount: 3 });
    expect(action).toEqual({ type: 'add', amount: 3 });
    expect(store.getState()).toEqual({ count: 3 });
  });

  it('runs thunks with dispatch and getState and returns their result', async () => {
    const store = createStore(counter);
    const result = await store.dispatch(async (dispatch, getState) => {
      dispatch({ type: 'inc' });
      await Promise.resolve();
      dispatch({ type: 'inc' });
      return getState().count * 10;
    });
    expect(result).toBe(20);
    expect(store.getState()).toEqual({ count: 2 });
  });

  it('lets thunks dispatch other thunks', () => {
    const store = createStore(counter);
    const addTwice = (amount: number) => (dispatch: Store<CounterState, CounterAction>['dispatch']) => {
      dispatch({ type: 'add', amount });
      dispatch({ type: 'add', amount });
    };
    store.dispatch((dispatch) => dispatch(addTwice(4)));
    expect(store.getState()).toEqual({ count: 8 });
  });

  it('rejects actions without a string type', () => {
    const store = createStore(counter);
    expect(() => Reflect.apply(store.dispatch, undefined, [42])).toThrow(
      'Actions must be objects with a string "type" (received number).',
    );
    expect(() => Reflect.apply(store.dispatch, undefined, [{ kind: 'inc' }])).toThrow(
      'Actions must be objects with a string "type" (received an object without a string type).',
    );
    expect(() => Reflect.apply(store.dispatch, undefined, [null])).toThrow(
      'Actions must be objects with a string "type" (received null).',
    );
  });

  it('forbids dispatching from inside a reducer', () => {
    const store = createStore(counter);
    nestedTarget = store;
    try {
      expect(() => store.dispatch({ type: 'nested' })).toThrow(
        'Reducers may not dispatch actions (received "inc" while reducing).',
      );
    } finally {
      nestedTarget = null;
    }
    // The store recovers after the failed dispatch
    store.dispatch({ type: 'inc' });
    expect(store.getState()).toEqual({ count: 1 });
  });

  it('notifies subscribers after each action', () => {
    const store = createStore(counter);
    const seen: number[] = [];
    store.subscribe(() => seen.push(store.getState().count));
    store.dispatch({ type: 'inc' });
    store.dispatch({ type: 'add', amount: 2 });
    expect(seen).toEqual([1, 3]);
  });

  it('stops notifying after unsubscribe, which is idempotent', () => {
    const store = createStore(counter);
    const listener = vi.fn();
    const other = vi.fn();
    const unsubscribe = store.subscribe(listener);
    store.subscribe(other);
    unsubscribe();
    unsubscribe();
    store.dispatch({ type: 'inc' });
    expect(listener).not.toHaveBeenCalled();
    expect(other).toHaveBeenCalledOnce();
  });

  it('applies subscription changes made during notification to the next dispatch', () => {
    const store = createStore(counter);
    const late = vi.fn();
    store.subscribe(() => {
      store.subscribe(late);
    });
    store.dispatch({ type: 'inc' });
    expect(late).not.toHaveBeenCalled();
    store.dispatch({ type: 'inc' });
    expect(late).toHaveBeenCalledOnce();
  });

  it('replaceReducer swaps the reducer and re-initialises', () => {
    const store = createStore(counter, { count: 1 });
    const doubling: Reducer<CounterState, CounterAction> = (state = { count: 0 }, action) =>
      action.type === 'inc' ? { count: state.count * 2 } : state;
    store.replaceReducer(doubling);
    expect(store.getState()).toEqual({ count: 1 });
    store.dispatch({ type: 'inc' });
    expect(store.getState()).toEqual({ count: 2 });
  });

  it('keeps each store independent', () => {
    const a = createStore(counter);
    const b = createStore(counter);
    a.dispatch({ type: 'inc' });
    expect(a.getState()).toEqual({ count: 1 });
    expect(b.getState()).toEqual({ count: 0 });
  });
});
