// Command-line argument parsing for the scripts

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface SearchArgs {
  query: string;
  minScore?: number;
  legacy: boolean;
}

export interface BackfillTitleArgs {
  missingOnly: boolean;
  dryRun: boolean;
}

export interface ExplainArgs {
  clusterId: string;
  question: string;
}

function readNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new UsageError(`${flag} expects a number`);
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

export function parseSearchArgs(argv: string[]): SearchArgs {
  const words: string[] = [];
  let minScore: number | undefined;
  let legacy = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--legacy') {
      legacy = true;
    } else if (arg === '--min-score') {
      minScore = readNumber(arg, argv[++i]);
    } else if (arg.startsWith('--min-score=')) {
      minScore = readNumber('--min-score', arg.slice('--min-score='.length));
    } else {
      words.push(arg);
    }
  }

  const query = words.join(' ').trim();
  if (!query) {
    throw new UsageError('A search query is required');
  }
  return { query, minScore, legacy };
}

export function parseBackfillTitleArgs(argv: string[]): BackfillTitleArgs {
  const known = new Set(['--missing-only', '--dry-run']);
  const unknown = argv.filter(arg => !known.has(arg));
  if (unknown.length > 0) {
    throw new UsageError(`Unknown option: ${unknown[0]}`);
  }
  return { missingOnly: argv.includes('--missing-only'), dryRun: argv.includes('--dry-run') };
}

export function parseExplainArgs(argv: string[]): ExplainArgs {
  const [clusterId, ...rest] = argv;
  const question = rest.join(' ').trim();
  if (!clusterId || !question) {
    throw new UsageError('A cluster id and a question are required');
  }
  return { clusterId, question };
}
