import { parseArgs } from 'util';
import { z } from 'zod';

export const COMMANDS = ['record', 'calibrate', 'devices'] as const;

const CliSchema = z
  .object({
    command: z.enum(COMMANDS),
    camera: z.coerce.number().int().nonnegative().optional(),
    ips: z.array(z.string().min(1)),
    noCamera: z.boolean(),
    samples: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive().optional(),
    help: z.boolean()
  })
  .superRefine((value, ctx) => {
    if (value.command === 'calibrate' && !value.samples && !value.help) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['samples'], message: 'calibrate needs --samples <file>' });
    }
  });

export type CliOptions = z.infer<typeof CliSchema>;

export const USAGE = `Usage: jugsense [record|calibrate|devices] [options]

  record                 manual recording mode (default)
  calibrate              build a ball profile from a sample file
  devices                probe each device for one complete sample

Options:
  --ip <addr>            device address, repeatable (overrides DEVICE_IPS)
  --camera <index>       capture device index
  --no-camera            record telemetry only, skip the capture check
  --samples <file>       calibration sample file (calibrate)
  --name <name>          profile name (calibrate)
  --timeout <ms>         probe timeout (devices)
  -h, --help             show this help
`;

export function parseCli(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      ip: { type: 'string', multiple: true },
      camera: { type: 'string' },
      'no-camera': { type: 'boolean', default: false },
      samples: { type: 'string' },
      name: { type: 'string' },
      timeout: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  return CliSchema.parse({
    command: positionals[0] ?? 'record',
    camera: values.camera,
    ips: values.ip ?? [],
    noCamera: values['no-camera'] ?? false,
    samples: values.samples,
    name: values.name,
    timeoutMs: values.timeout,
    help: values.help ?? false
  });
}
