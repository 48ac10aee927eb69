/**
 * Tests for the Directory Version Locator
 */

import * as fs from 'fs';
import * as path from 'path';
import { DirectoryLocator, compareVersionLabels } from '../src/store/version-locator';
import { SPEC_ROOT, makeTempDir } from './helpers';

let root: string;

function touch(...segments: string[]): string {
  const file = path.join(root, ...segments);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, 'openapi: 3.0.3\n', 'utf-8');
  return file;
}

beforeEach(() => {
  root = makeTempDir('locator');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('DirectoryLocator', () => {
  // ─── locate() ─────────────────────────────────────────────────────────

  describe('locate', () => {
    test('finds the contract in <root>/<version>/current', async () => {
      const locator = new DirectoryLocator(SPEC_ROOT);
      expect(await locator.locate('v1')).toBe(path.join(SPEC_ROOT, 'v1', 'current', 'shop-api.yaml'));
    });

    test('picks the alphabetically first matching file', async () => {
      touch('v1', 'current', 'zeta.yaml');
      const alpha = touch('v1', 'current', 'alpha.json');
      touch('v1', 'current', 'README.md');

      expect(await new DirectoryLocator(root).locate('v1')).toBe(alpha);
    });

    test('ignores files with other extensions', async () => {
      touch('v1', 'current', 'notes.txt');
      expect(await new DirectoryLocator(root).locate('v1')).toBeNull();
    });

    test('matches extensions case-insensitively', async () => {
      const file = touch('v1', 'current', 'API.YML');
      expect(await new DirectoryLocator(root).locate('v1')).toBe(file);
    });

    test('returns null for a missing version directory', async () => {
      expect(await new DirectoryLocator(root).locate('v9')).toBeNull();
    });

    test('honors contractDir and extensions options', async () => {
      touch('v1', 'current', 'api.yaml');
      const file = touch('v1', 'published', 'api.json');
      const locator = new DirectoryLocator(root, { contractDir: 'published', extensions: ['.json'] });

      expect(locator.directoryFor('v1')).toBe(path.join(root, 'v1', 'published'));
      expect(await locator.locate('v1')).toBe(file);
    });

    test('resolves a relative spec root against the working directory', () => {
      const locator = new DirectoryLocator('specs');
      expect(locator.directoryFor('v2')).toBe(path.resolve('specs', 'v2', 'current'));
    });
  });

  // ─── listVersions() ───────────────────────────────────────────────────

  describe('listVersions', () => {
    test('lists version directories in natural order', async () => {
      touch('v10', 'current', 'api.yaml');
      touch('v2', 'current', 'api.yaml');
      touch('v1', 'current', 'api.yaml');

      expect(await new DirectoryLocator(root).listVersions()).toEqual(['v1', 'v2', 'v10']);
    });

    test('skips directories without a contract directory', async () => {
      touch('v1', 'current', 'api.yaml');
      fs.mkdirSync(path.join(root, 'drafts'));
      touch('notes.yaml');

      expect(await new DirectoryLocator(root).listVersions()).toEqual(['v1']);
    });

    test('returns an empty list for a missing root', async () => {
      expect(await new DirectoryLocator(path.join(root, 'missing')).listVersions()).toEqual([]);
    });

    test('lists the fixture versions', async () => {
      expect(await new DirectoryLocator(SPEC_ROOT).listVersions()).toEqual(['v1', 'v2', 'v3']);
    });
  });

  test('compareVersionLabels sorts numerically', () => {
    expect(['v10', 'v1', 'v2'].sort(compareVersionLabels)).toEqual(['v1', 'v2', 'v10']);
  });
});
