import { createStore, StoreApi } from 'zustand/vanilla';
import { DragState, SelectionRange, TimeUnit } from '@/types/audio';
import { DEFAULT_TIME_UNIT } from '@/lib/config';
import {
  SelectionAction,
  SelectionSnapshot,
  createInitialSnapshot,
  reduceSelection,
} from './selectionReducer';

export interface SelectionState extends SelectionSnapshot {
  // Single mutation path; the named actions below are shorthands for it
  dispatch: (action: SelectionAction) => void;

  reset: (durationMs: number) => void;
  setStart: (ms: number) => void;
  setEnd: (ms: number) => void;
  setUnit: (unit: TimeUnit) => void;

  // Drag state machine (x in the display unit)
  press: (x: number) => void;
  dragTo: (x: number) => void;
  release: () => void;

  getRange: () => SelectionRange;
  getDragState: () => DragState;
}

export type SelectionStore = StoreApi<SelectionState>;

export const createSelectionStore = (unit: TimeUnit = DEFAULT_TIME_UNIT): SelectionStore =>
  createStore<SelectionState>((set, get) => {
    const dispatch = (action: SelectionAction) => {
      set((state) => reduceSelection(state, action));
    };

    return {
      ...createInitialSnapshot(unit),

      dispatch,

      reset: (durationMs) => dispatch({ type: 'reset', durationMs }),
      setStart: (ms) => dispatch({ type: 'setStart', ms }),
      setEnd: (ms) => dispatch({ type: 'setEnd', ms }),
      setUnit: (nextUnit) => dispatch({ type: 'setUnit', unit: nextUnit }),

      press: (x) => dispatch({ type: 'press', x }),
      dragTo: (x) => dispatch({ type: 'dragTo', x }),
      release: () => dispatch({ type: 'release' }),

      getRange: () => {
        const { startMs, endMs } = get();
        return { startMs, endMs };
      },

      getDragState: () => get().dragState,
    };
  });
