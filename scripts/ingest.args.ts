/**
 * Argument parsing for scripts/ingest.ts, kept apart so it can be tested
 * without running the CLI.
 */

import { AppError } from '@/src/lib/errors/app-error';

export const INGEST_COMMANDS = [
  'search',
  'enrich',
  'bulk',
  'all-missing',
  'import-standards',
  'sync-limits',
  'sync-all-limits',
  'status',
] as const;

export type IngestCommand = (typeof INGEST_COMMANDS)[number];

export type IngestArgs = {
  command: IngestCommand;
  /** Ingredient name, ingredient id, or bulk names */
  positional: string[];
  owner?: string;
  cas?: string;
  overwrite?: boolean;
  limit?: number;
  file?: string;
  dryRun: boolean;
};

export const INGEST_USAGE = `Usage: tsx scripts/ingest.ts <command> [options]

Commands:
  search <name>              Preview merged source data, no write
  enrich <name>              Enrich one ingredient and save it
  bulk [names...]            Enrich several names (or --file, one per line)
  all-missing                Enrich stored ingredients with no enrichment data
  import-standards <file>    Import a regulatory standards feed
  sync-limits <id>           Copy regulatory limits onto one ingredient
  sync-all-limits            Copy regulatory limits onto every ingredient
  status                     Ingredient totals and enrichment coverage

Options:
  --owner <id>     Owner id (default ENRICH_OWNER_ID)
  --cas <number>   Registry number hint for search/enrich
  --overwrite      Replace existing values instead of filling missing ones
  --limit <n>      Maximum number of ingredients for bulk/all-missing
  --file <path>    Names file (bulk) or feed file (import-standards)
  --dry-run        Use an in-memory store; nothing is persisted`;

function isCommand(value: string): value is IngestCommand {
  return INGEST_COMMANDS.some((c) => c === value);
}

function invalid(message: string): AppError {
  return new AppError('VALIDATION_ERROR', message);
}

export function parseIngestArgs(argv: string[]): IngestArgs {
  const [command, ...rest] = argv;
  if (!command || !isCommand(command)) {
    throw invalid(command ? `Unknown command: ${command}` : 'Missing command');
  }

  const args: IngestArgs = { command, positional: [], dryRun: false };

  const valueOf = (flag: string, i: number): string => {
    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw invalid(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--owner') {
      args.owner = valueOf(arg, i);
      i++;
    } else if (arg === '--cas') {
      args.cas = valueOf(arg, i);
      i++;
    } else if (arg === '--file') {
      args.file = valueOf(arg, i);
      i++;
    } else if (arg === '--limit') {
      const raw = valueOf(arg, i);
      const limit = Number(raw);
      if (!Number.isInteger(limit) || limit < 1) {
        throw invalid(`--limit must be a positive integer, got ${raw}`);
      }
      args.limit = limit;
      i++;
    } else if (arg === '--overwrite') {
      args.overwrite = true;
    } else if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg.startsWith('--')) {
      throw invalid(`Unknown option: ${arg}`);
    } else {
      args.positional.push(arg);
    }
  }

  switch (args.command) {
    case 'search':
    case 'enrich':
      if (args.positional.length === 0) {
        throw invalid(`${args.command} needs an ingredient name`);
      }
      // unquoted multi-word names arrive as several arguments
      args.positional = [args.positional.join(' ')];
      break;
    case 'bulk':
      if (args.positional.length === 0 && !args.file) {
        throw invalid('bulk needs names or --file');
      }
      break;
    case 'import-standards':
      if (!args.file) args.file = args.positional[0];
      if (!args.file) throw invalid('import-standards needs a feed file');
      break;
    case 'sync-limits':
      if (args.positional.length !== 1) {
        throw invalid('sync-limits needs exactly one ingredient id');
      }
      break;
    case 'all-missing':
    case 'sync-all-limits':
    case 'status':
      break;
  }

  return args;
}

/** Names file: one name per line; blank lines and `#` comments skipped */
export function parseNamesList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}
