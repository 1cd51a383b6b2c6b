import { DragState, SliderConfig, TimeUnit } from '@/types/audio';
import { clampMs, fromMs, getSliderConfig, toMs } from '@/lib/time-basis';

export interface SelectionSnapshot {
  durationMs: number;
  startMs: number; // Canonical, always whole milliseconds
  endMs: number;
  unit: TimeUnit;
  slider: SliderConfig;
  dragState: DragState;
}

/**
 * Every mutation of the selection goes through one of these.
 * Pointer positions (`x`) are in the current display unit; everything
 * else is canonical milliseconds.
 */
export type SelectionAction =
  | { type: 'reset'; durationMs: number }
  | { type: 'setStart'; ms: number }
  | { type: 'setEnd'; ms: number }
  | { type: 'setUnit'; unit: TimeUnit }
  | { type: 'press'; x: number }
  | { type: 'dragTo'; x: number }
  | { type: 'release' };

export function createInitialSnapshot(unit: TimeUnit): SelectionSnapshot {
  return {
    durationMs: 0,
    startMs: 0,
    endMs: 0,
    unit,
    slider: getSliderConfig(0, unit),
    dragState: 'idle',
  };
}

/**
 * Pure (state, action) -> state. Returns the same object when the action
 * changes nothing, so store subscribers are not notified.
 *
 * Boundaries are clamped into [0, durationMs] but never ordered: an
 * inverted range is a legal intermediate state while dragging.
 */
export function reduceSelection<S extends SelectionSnapshot>(state: S, action: SelectionAction): S {
  switch (action.type) {
    case 'reset': {
      const durationMs = clampMs(action.durationMs, Number.MAX_SAFE_INTEGER);
      return {
        ...state,
        durationMs,
        startMs: 0,
        endMs: durationMs,
        slider: getSliderConfig(durationMs, state.unit),
        dragState: 'idle',
      };
    }

    case 'setStart': {
      const startMs = clampMs(action.ms, state.durationMs);
      return startMs === state.startMs ? state : { ...state, startMs };
    }

    case 'setEnd': {
      const endMs = clampMs(action.ms, state.durationMs);
      return endMs === state.endMs ? state : { ...state, endMs };
    }

    case 'setUnit':
      if (action.unit === state.unit) return state;
      return {
        ...state,
        unit: action.unit,
        slider: getSliderConfig(state.durationMs, action.unit),
      };

    case 'press': {
      if (!Number.isFinite(action.x)) return state;
      const ms = clampMs(toMs(action.x, state.unit), state.durationMs);
      const distanceToStart = Math.abs(action.x - fromMs(state.startMs, state.unit));
      const distanceToEnd = Math.abs(action.x - fromMs(state.endMs, state.unit));

      if (distanceToStart < distanceToEnd) {
        return { ...state, dragState: 'draggingStart', startMs: ms };
      }
      return { ...state, dragState: 'draggingEnd', endMs: ms };
    }

    case 'dragTo': {
      if (!Number.isFinite(action.x) || state.dragState === 'idle') return state;
      const ms = clampMs(toMs(action.x, state.unit), state.durationMs);
      if (state.dragState === 'draggingStart') {
        return ms === state.startMs ? state : { ...state, startMs: ms };
      }
      return ms === state.endMs ? state : { ...state, endMs: ms };
    }

    case 'release':
      return state.dragState === 'idle' ? state : { ...state, dragState: 'idle' };
  }
}
