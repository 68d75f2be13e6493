/**
 * Command-line argument parsing
 */

import { parseArgs } from 'node:util';
import {
  parseEntityTypes,
  parseLevels,
  DEFAULT_SELECTED_ENTITY_TYPES,
} from '@inbox-entities/shared';

export const CLI_MODES = ['stream', 'batch', 'measure'] as const;

export type CliMode = (typeof CLI_MODES)[number];

export interface CliOptions {
  mode: CliMode;
  /** Undefined means stdin in stream mode, the configured file otherwise */
  file?: string;
  entityTypes: string[];
  workers?: number;
  levels?: number[];
  output?: string;
}

export const USAGE = `Usage: extraction-cli <stream|batch|measure> [options]

Options:
  -f, --file <path>        Emails file, one email per block separated by "---" lines
  -e, --entities <list>    Comma-separated entity types (default: ${DEFAULT_SELECTED_ENTITY_TYPES.join(',')})
      --all                Extract all identifiable entities
  -w, --workers <n>        Worker pool size for batch mode
      --levels <list>      Concurrency levels for measure mode (default: 2,4,8)
  -o, --output <path>      Timing report file for measure mode
`;

function isCliMode(value: string): value is CliMode {
  return CLI_MODES.some((mode) => mode === value);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f' },
      entities: { type: 'string', short: 'e' },
      all: { type: 'boolean' },
      workers: { type: 'string', short: 'w' },
      levels: { type: 'string' },
      output: { type: 'string', short: 'o' },
    },
  });

  const [mode] = positionals;
  if (!mode || !isCliMode(mode)) {
    throw new Error(`Unknown mode: ${mode ?? '(none)'}\n\n${USAGE}`);
  }

  let workers: number | undefined;
  if (values.workers !== undefined) {
    workers = parseInt(values.workers, 10);
    if (!Number.isInteger(workers) || workers < 1) {
      throw new Error(`--workers must be a positive integer, got "${values.workers}"`);
    }
  }

  let levels: number[] | undefined;
  if (values.levels !== undefined) {
    levels = parseLevels(values.levels);
    if (levels.length === 0) {
      throw new Error(`--levels must list positive integers, got "${values.levels}"`);
    }
  }

  let entityTypes: string[];
  if (values.all) {
    entityTypes = [];
  } else if (values.entities !== undefined) {
    entityTypes = parseEntityTypes(values.entities);
  } else {
    entityTypes = [...DEFAULT_SELECTED_ENTITY_TYPES];
  }

  return {
    mode,
    file: values.file,
    entityTypes,
    workers,
    levels,
    output: values.output,
  };
}
