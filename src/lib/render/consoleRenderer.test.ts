import { createConsoleRenderer, summarizeFrame } from './consoleRenderer';
import { buildRenderFrame } from './renderFrame';
import { analyze } from '@/lib/analysis/spectral-analyzer';
import { createInitialSnapshot, reduceSelection } from '@/stores/selectionReducer';
import { createSilentLogger } from '@/lib/test-utils/audio-fixtures';

const tone = Array.from({ length: 8 }, (_, i) => Math.round(1000 * Math.cos((2 * Math.PI * i) / 8)));

function frameFor(startMs: number, endMs: number) {
  let selection = reduceSelection(createInitialSnapshot('seconds'), { type: 'reset', durationMs: 4000 });
  selection = reduceSelection(selection, { type: 'setStart', ms: startMs });
  selection = reduceSelection(selection, { type: 'setEnd', ms: endMs });
  return buildRenderFrame('buffer-1', selection, analyze(tone, 8000, startMs / 1000, endMs / 1000));
}

describe('buildRenderFrame', () => {
  it('expresses markers in the display unit', () => {
    const frame = frameFor(1500, 2500);

    expect(frame.bufferId).toBe('buffer-1');
    expect(frame.unit).toBe('seconds');
    expect(frame.markers).toEqual({ start: 1.5, end: 2.5 });
    expect(frame.slider).toEqual({ min: 0, max: 4, step: 0.001 });
    expect(frame.dragState).toBe('idle');
  });
});

describe('summarizeFrame', () => {
  it('reports the range, sample count and dominant frequency', () => {
    expect(summarizeFrame(frameFor(1500, 2500))).toEqual({
      range: '1.5s - 2.5s',
      samples: 8,
      peakFrequencyHz: 1000,
    });
  });
});

describe('createConsoleRenderer', () => {
  it('logs one summary per frame', () => {
    const logger = createSilentLogger();
    const renderer = createConsoleRenderer(logger);

    renderer.render(frameFor(0, 1000));

    expect(logger.info).toHaveBeenCalledWith('Selection updated', {
      range: '0s - 1s',
      samples: 8,
      peakFrequencyHz: 1000,
    });
  });
});
