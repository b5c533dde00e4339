import { VehicleModel } from '../types/index.js';

export const CLI_MODES = ['scrape', 'multi', 'list-models', 'stats', 'export', 'serve', 'schedule', 'summary'] as const;

export type CliMode = (typeof CLI_MODES)[number];

export interface CliArgs {
  mode: CliMode;
  make: string;
  model: string;
  /** Undefined means auto-detect */
  pages?: number;
  delay: number;
  stopOnEmpty: boolean;
  adaptiveDelay: boolean;
  modelsFile?: string;
  dataDir?: string;
  exportDir?: string;
  schedule?: string;
  runNow: boolean;
  dryRun: boolean;
}

function isMode(value: string): value is CliMode {
  return CLI_MODES.some(mode => mode === value);
}

function valueOf(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find(arg => arg.startsWith(prefix))?.slice(prefix.length);
}

/**
 * Parse `--key=value` style arguments (process.argv.slice(2))
 */
export function parseCliArgs(args: string[]): CliArgs {
  const mode = valueOf(args, 'mode') || 'scrape';
  if (!isMode(mode)) {
    throw new Error(`Unknown mode "${mode}", expected one of: ${CLI_MODES.join(', ')}`);
  }

  const pagesArg = valueOf(args, 'pages');
  let pages: number | undefined;
  if (pagesArg !== undefined) {
    pages = Number(pagesArg);
    if (!Number.isInteger(pages) || pages < 1) {
      throw new Error(`--pages must be a positive integer, got "${pagesArg}"`);
    }
  }

  const delayArg = valueOf(args, 'delay');
  const delay = delayArg === undefined ? 2 : Number(delayArg);
  if (!Number.isFinite(delay) || delay < 0) {
    throw new Error(`--delay must be a non-negative number, got "${delayArg}"`);
  }

  return {
    mode,
    make: valueOf(args, 'make') || 'mercedes-benz',
    model: valueOf(args, 'model') || 'a-200',
    // --scrape-all always walks every detected page
    pages: args.includes('--scrape-all') ? undefined : pages,
    delay,
    stopOnEmpty: !args.includes('--no-auto-stop'),
    adaptiveDelay: !args.includes('--no-adaptive-delay'),
    modelsFile: valueOf(args, 'models-file'),
    dataDir: valueOf(args, 'data-dir'),
    exportDir: valueOf(args, 'export-dir'),
    schedule: valueOf(args, 'schedule'),
    runNow: args.includes('--run-now'),
    dryRun: args.includes('--dry-run'),
  };
}

/**
 * Read make/model pairs from a CSV with a `make,model` header.
 * Blank lines and rows with an empty cell are ignored.
 */
export function parseModelsCsv(content: string): VehicleModel[] {
  const lines = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length === 0) {
    return [];
  }

  const header = lines[0].split(',').map(cell => cell.trim().toLowerCase());
  const makeIndex = header.indexOf('make');
  const modelIndex = header.indexOf('model');
  if (makeIndex === -1 || modelIndex === -1) {
    throw new Error('Models file needs a "make,model" header');
  }

  const models: VehicleModel[] = [];
  for (const line of lines.slice(1)) {
    const cells = line.split(',').map(cell => cell.trim());
    const make = cells[makeIndex];
    const model = cells[modelIndex];
    if (make && model) {
      models.push({ make, model });
    }
  }

  return models;
}
