import { describe, expect, test } from 'vitest';

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { installConsoleFileMirror } from '../../src/core/unified-logging.js';
import { tempDir } from '../support/fixtures.js';

describe('unified logging', () => {
  test('mirrors console output into a single timestamped file', async () => {
    const filePath = join(tempDir('logs'), 'nested', 'worldview.log');

    const handle = installConsoleFileMirror({
      filePath,
      minLevel: 'info',
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    });
    try {
      console.log('hello', { a: 1 });
      console.debug('too chatty');
      console.error('boom');
      await new Promise((r) => setTimeout(r, 20));

      expect(existsSync(filePath)).toBe(true);
      const lines = readFileSync(filePath, 'utf8').trimEnd().split('\n');
      expect(lines).toEqual([
        '[2026-03-01T12:00:00.000Z] INFO: hello { a: 1 }',
        '[2026-03-01T12:00:00.000Z] ERROR: boom',
      ]);
    } finally {
      handle.uninstall();
    }
  });
});
