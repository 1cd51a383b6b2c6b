import {
  AudioBuffer,
  Boundary,
  ChannelMode,
  ExportResult,
  TimeUnit,
} from '@/types/audio';
import { AudioCodec } from '@/lib/audio/codec';
import { loadAudioBuffer, mixdownToMono, sliceAudioBuffer } from '@/lib/audio/audio-buffer';
import { analyze } from '@/lib/analysis/spectral-analyzer';
import { exportSelection } from '@/lib/export/exportService';
import { describeError } from '@/lib/errors';
import { Logger, createLogger } from '@/lib/logger';
import { RenderFrame, SelectionRenderer, buildRenderFrame } from '@/lib/render/renderFrame';
import { SelectionAction, SelectionSnapshot } from '@/stores/selectionReducer';
import { SelectionState, createSelectionStore } from '@/stores/selectionStore';
import { fromMs, toMs } from '@/lib/time-basis';

/**
 * Raw UI events. Slider values and pointer positions are in the current
 * display unit; a pointer event outside the plot carries `x: null`.
 */
export type SelectionInput =
  | { type: 'slider'; boundary: Boundary; value: number }
  | { type: 'pointerPress'; x: number | null }
  | { type: 'pointerMove'; x: number | null }
  | { type: 'pointerRelease' }
  | { type: 'unit'; unit: TimeUnit };

export interface SelectionControllerOptions {
  codec: AudioCodec;
  renderer: SelectionRenderer;
  logger?: Logger;
  unit?: TimeUnit;
  /** How multi-channel audio is fed to the analyzer. Defaults to 'interleaved'. */
  channelMode?: ChannelMode;
}

export interface SelectionController {
  load: (filePath: string) => Promise<AudioBuffer>;
  handleInput: (input: SelectionInput) => void;
  exportTo: (outputPath: string) => Promise<ExportResult>;
  getState: () => SelectionState;
  getBuffer: () => AudioBuffer | null;
  getLastFrame: () => RenderFrame | null;
}

function isValidCoordinate(x: number | null): x is number {
  return x !== null && Number.isFinite(x);
}

/**
 * Turn a UI event into a store action, or null when it should be ignored.
 */
export function toSelectionAction(input: SelectionInput, unit: TimeUnit): SelectionAction | null {
  switch (input.type) {
    case 'slider':
      if (!Number.isFinite(input.value)) return null;
      return input.boundary === 'start'
        ? { type: 'setStart', ms: toMs(input.value, unit) }
        : { type: 'setEnd', ms: toMs(input.value, unit) };
    case 'pointerPress':
      return isValidCoordinate(input.x) ? { type: 'press', x: input.x } : null;
    case 'pointerMove':
      return isValidCoordinate(input.x) ? { type: 'dragTo', x: input.x } : null;
    case 'pointerRelease':
      return { type: 'release' };
    case 'unit':
      return { type: 'setUnit', unit: input.unit };
  }
}

function needsRender(prev: SelectionSnapshot, next: SelectionSnapshot): boolean {
  return (
    prev.startMs !== next.startMs ||
    prev.endMs !== next.endMs ||
    prev.unit !== next.unit ||
    prev.durationMs !== next.durationMs ||
    prev.dragState !== next.dragState
  );
}

/**
 * Owns the selection store and the loaded buffer. Every input is applied
 * once through the store's reducer; rendering is a separate read-only step
 * that slices the buffer, runs the analyzer and pushes a frame.
 */
export function createSelectionController(options: SelectionControllerOptions): SelectionController {
  const { codec, renderer, logger = createLogger('Selection'), channelMode = 'interleaved' } = options;

  const store = createSelectionStore(options.unit);
  let buffer: AudioBuffer | null = null;
  let lastFrame: RenderFrame | null = null;
  // Set while an update (including its render) is running. Inputs that arrive
  // in that window, e.g. a slider echoing the value we just pushed, are dropped.
  let updateInProgress = false;

  const render = (current: AudioBuffer) => {
    const selection = store.getState();
    const slice = sliceAudioBuffer(current, selection.startMs, selection.endMs);
    const samples = channelMode === 'mixdown' ? mixdownToMono(slice, current.channels) : slice;

    const analysis = analyze(
      samples,
      current.sampleRate,
      fromMs(selection.startMs, selection.unit),
      fromMs(selection.endMs, selection.unit)
    );

    lastFrame = buildRenderFrame(current.id, selection, analysis);
    renderer.render(lastFrame);
  };

  const runUpdate = (apply: () => void, forceRender = false) => {
    if (updateInProgress) {
      logger.debug('Dropped re-entrant update');
      return;
    }
    updateInProgress = true;
    try {
      const prev = store.getState();
      apply();
      const next = store.getState();
      if (buffer && (forceRender || needsRender(prev, next))) {
        render(buffer);
      }
    } finally {
      updateInProgress = false;
    }
  };

  const handleInput = (input: SelectionInput) => {
    // Unit changes apply with or without a file; everything else needs one
    if (!buffer && input.type !== 'unit') return;

    const action = toSelectionAction(input, store.getState().unit);
    if (!action) {
      logger.debug('Ignored input', { type: input.type });
      return;
    }

    runUpdate(() => store.getState().dispatch(action));
  };

  const load = async (filePath: string): Promise<AudioBuffer> => {
    // On failure the previous buffer and selection stay as they were
    const next = await loadAudioBuffer(filePath, codec).catch((err: unknown) => {
      logger.error('Failed to load audio', { filePath, error: describeError(err) });
      throw err;
    });

    // Buffer and selection are swapped together; a reload with the same
    // duration leaves the snapshot as it was but still needs a fresh frame
    runUpdate(() => {
      buffer = next;
      store.getState().reset(next.durationMs);
    }, true);

    logger.info('Loaded audio', {
      filePath,
      durationMs: next.durationMs,
      sampleRate: next.sampleRate,
      channels: next.channels,
    });
    return next;
  };

  const exportTo = (outputPath: string): Promise<ExportResult> =>
    exportSelection({
      buffer,
      range: store.getState().getRange(),
      outputPath,
      codec,
      logger,
    });

  return {
    load,
    handleInput,
    exportTo,
    getState: () => store.getState(),
    getBuffer: () => buffer,
    getLastFrame: () => lastFrame,
  };
}
