import { ZodError } from 'zod';
import { parseTrimArgs, TRIM_USAGE, TrimArgs } from '@/lib/cli/trimArgs';
import { createFfmpegCodec } from '@/lib/audio/ffmpeg-codec';
import { createConsoleRenderer } from '@/lib/render/consoleRenderer';
import { createSelectionController } from '@/lib/selection/selectionController';
import { createLogger } from '@/lib/logger';
import { AudioTrimmerError } from '@/lib/errors';

async function main() {
  let args: TrimArgs;
  try {
    args = parseTrimArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ZodError) {
      console.error(err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n'));
      console.error(TRIM_USAGE);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const logger = createLogger('Trimmer', { debug: args.verbose });
  const controller = createSelectionController({
    codec: createFfmpegCodec(createLogger('Codec', { debug: args.verbose })),
    renderer: createConsoleRenderer(logger),
    logger,
    unit: args.unit,
    channelMode: args.mixdown ? 'mixdown' : 'interleaved',
  });

  await controller.load(args.input);

  if (args.start !== undefined) {
    controller.handleInput({ type: 'slider', boundary: 'start', value: args.start });
  }
  if (args.end !== undefined) {
    controller.handleInput({ type: 'slider', boundary: 'end', value: args.end });
  }

  if (args.out) {
    const result = await controller.exportTo(args.out);
    console.log(`Trimmed audio saved at: ${result.outputPath} (${result.durationMs} ms)`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof AudioTrimmerError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
