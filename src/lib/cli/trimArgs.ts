import { parseArgs } from 'util';
import { z } from 'zod';

const TrimArgsSchema = z.object({
  input: z.string().min(1, 'An input file is required'),
  unit: z.enum(['seconds', 'milliseconds']).default('seconds'),
  start: z.coerce.number().nonnegative().optional(),
  end: z.coerce.number().nonnegative().optional(),
  out: z.string().min(1).optional(),
  mixdown: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type TrimArgs = z.infer<typeof TrimArgsSchema>;

export const TRIM_USAGE =
  'Usage: npm run trim -- <input> [--start <n>] [--end <n>] [--unit seconds|milliseconds] [--out <file>] [--mixdown] [--verbose]';

/**
 * Parse CLI arguments. `--start` and `--end` are in `--unit`.
 * @throws ZodError when an argument is missing or malformed
 */
export function parseTrimArgs(argv: string[]): TrimArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
      unit: { type: 'string' },
      out: { type: 'string' },
      mixdown: { type: 'boolean' },
      verbose: { type: 'boolean' },
    },
  });

  return TrimArgsSchema.parse({ ...values, input: positionals[0] ?? '' });
}
