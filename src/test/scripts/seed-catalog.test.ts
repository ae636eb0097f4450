import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { parseSeedArgs } from '../../../scripts/seed-catalog.js';
import { CatalogLoader } from '../../modules/catalog/catalog.loader.js';
import { MemoryCatalogStore } from '../../modules/catalog/catalog.memory-store.js';

describe('seed-catalog', () => {
  describe('parseSeedArgs', () => {
    it('defaults to the sample catalog', () => {
      const options = parseSeedArgs([]);

      expect(options.dryRun).toBe(false);
      expect(options.timeoutMs).toBeUndefined();
      expect(options.file.pathname.endsWith('/data/sample-catalog.json')).toBe(true);
    });

    it('reads a file relative to the working directory and the flags', () => {
      const options = parseSeedArgs(['--dry-run', 'batches/week-1.json', '--timeout-ms', '500'], '/srv/catalog');

      expect(options.file.href).toBe('file:///srv/catalog/batches/week-1.json');
      expect(options.dryRun).toBe(true);
      expect(options.timeoutMs).toBe(500);
    });

    it('rejects unknown options and bad timeouts', () => {
      expect(() => parseSeedArgs(['--force'])).toThrow('Unknown option: --force');
      expect(() => parseSeedArgs(['--timeout-ms', 'soon'])).toThrow('--timeout-ms needs a positive whole number');
    });
  });

  it('ships a sample catalog that loads cleanly', async () => {
    const batch: unknown = JSON.parse(
      await readFile(new URL('../../../data/sample-catalog.json', import.meta.url), 'utf8')
    );

    const result = await new CatalogLoader(new MemoryCatalogStore()).load(batch);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.values(result.ids).map((ids) => ids.length)).toEqual([5, 10, 2, 7, 10]);
  });
});
