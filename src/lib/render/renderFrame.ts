import { AnalysisResult, DragState, SliderConfig, TimeUnit } from '@/types/audio';
import { SelectionSnapshot } from '@/stores/selectionReducer';
import { fromMs } from '@/lib/time-basis';

/**
 * Everything the drawing surface needs for one redraw. Marker and slider
 * values are already expressed in the display unit.
 */
export interface RenderFrame {
  bufferId: string;
  unit: TimeUnit;
  dragState: DragState;
  markers: { start: number; end: number };
  slider: SliderConfig;
  analysis: AnalysisResult;
}

/**
 * The plotting/widget collaborator. It draws the two markers and both
 * plots, and positions the sliders at `frame.markers`. Pointer events it
 * reports back must already be in the plot's time coordinate.
 */
export interface SelectionRenderer {
  render(frame: RenderFrame): void;
}

export function buildRenderFrame(
  bufferId: string,
  selection: SelectionSnapshot,
  analysis: AnalysisResult
): RenderFrame {
  return {
    bufferId,
    unit: selection.unit,
    dragState: selection.dragState,
    markers: {
      start: fromMs(selection.startMs, selection.unit),
      end: fromMs(selection.endMs, selection.unit),
    },
    slider: selection.slider,
    analysis,
  };
}
