/**
 * Seed script to load a catalog batch
 * Run with: npm run seed -- [file] [--dry-run] [--timeout-ms N]
 */

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import dotenv from 'dotenv';
import { connectDatabase, disconnectDatabase } from '../src/config/database.js';
import { CatalogLoader, MemoryCatalogStore, MongoCatalogStore } from '../src/modules/catalog/index.js';
import type { LoadResult } from '../src/modules/catalog/index.js';

dotenv.config();

const DEFAULT_BATCH_FILE = new URL('../data/sample-catalog.json', import.meta.url);

export interface SeedOptions {
  file: URL;
  dryRun: boolean;
  timeoutMs?: number;
}

/**
 * Parse `[file] [--dry-run] [--timeout-ms N]`.
 */
export function parseSeedArgs(argv: string[], cwd: string = process.cwd()): SeedOptions {
  const options: SeedOptions = { file: DEFAULT_BATCH_FILE, dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--timeout-ms') {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error('--timeout-ms needs a positive whole number');
      }
      options.timeoutMs = value;
    } else if (arg?.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (arg !== undefined) {
      options.file = new URL(arg, pathToFileURL(`${cwd}/`));
    }
  }

  return options;
}

function printResult(result: LoadResult): void {
  if (result.ok) {
    console.log(`Batch ${result.batchId} committed in ${result.durationMs}ms`);
    for (const [section, ids] of Object.entries(result.ids)) {
      if (ids.length > 0) {
        console.log(`  ${section}: ${ids.map((assigned) => `${assigned.ref ?? `#${assigned.index}`}=${assigned.id}`).join(', ')}`);
      }
    }
    return;
  }

  console.error(`Batch ${result.batchId} ${result.state} with ${result.errors.length} error(s):`);
  for (const error of result.errors) {
    console.error(`  [${error.code}] ${error.message}`);
  }
}

async function seedCatalog(options: SeedOptions): Promise<boolean> {
  const batch: unknown = JSON.parse(await readFile(options.file, 'utf8'));
  console.log(`Loading ${options.file.pathname}${options.dryRun ? ' (dry run, in-memory store)' : ''}`);

  if (options.dryRun) {
    const result = await new CatalogLoader(new MemoryCatalogStore()).load(batch, { timeoutMs: options.timeoutMs });
    printResult(result);
    return result.ok;
  }

  await connectDatabase();
  try {
    const store = new MongoCatalogStore();
    await store.prepare();
    const result = await new CatalogLoader(store).load(batch, { timeoutMs: options.timeoutMs });
    printResult(result);
    return result.ok;
  } finally {
    await disconnectDatabase();
  }
}

// Only run when executed directly, not when imported by tests
if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  seedCatalog(parseSeedArgs(process.argv.slice(2)))
    .then((ok) => {
      process.exit(ok ? 0 : 1);
    })
    .catch((error: unknown) => {
      console.error('Seed failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
