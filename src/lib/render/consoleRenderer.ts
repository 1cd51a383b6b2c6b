import { findPeakFrequency } from '@/lib/analysis/spectral-analyzer';
import { Logger } from '@/lib/logger';
import { RenderFrame, SelectionRenderer } from './renderFrame';

const UNIT_SUFFIX = { seconds: 's', milliseconds: 'ms' } as const;

export interface FrameSummary {
  range: string;
  samples: number;
  peakFrequencyHz: number | null;
}

export function summarizeFrame(frame: RenderFrame): FrameSummary {
  const suffix = UNIT_SUFFIX[frame.unit];
  return {
    range: `${frame.markers.start}${suffix} - ${frame.markers.end}${suffix}`,
    samples: frame.analysis.amplitudes.length,
    peakFrequencyHz: findPeakFrequency(frame.analysis),
  };
}

/**
 * Text stand-in for a plotting surface, used by the CLI.
 */
export function createConsoleRenderer(logger: Logger): SelectionRenderer {
  return {
    render(frame) {
      logger.info('Selection updated', summarizeFrame(frame));
    },
  };
}
