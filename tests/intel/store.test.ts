import { appendFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { SignalStore } from '../../src/intel/store.js';
import { makeSignal, tempDir } from '../support/fixtures.js';

describe('SignalStore', () => {
  it('reads from a cursor, counting malformed lines and ignoring a partial tail', () => {
    const path = join(tempDir('store'), 'alpha.jsonl');
    const first = makeSignal({ source: 'alice' });
    const second = makeSignal({ source: 'bob' });
    const third = makeSignal({ source: 'carol' });
    const thirdLine = JSON.stringify(third);
    writeFileSync(
      path,
      `${JSON.stringify(first)}\n{broken\n${JSON.stringify(second)}\n${thirdLine.slice(0, 10)}`,
      'utf-8'
    );
    const store = new SignalStore(path);

    const batch = store.readFrom(0);
    expect(batch.signals.map((signal) => signal.source)).toEqual(['alice', 'bob']);
    expect(batch.malformed).toHaveLength(1);
    expect(batch.nextCursor).toBe(3);

    expect(store.readFrom(3)).toEqual({ signals: [], malformed: [], nextCursor: 3 });

    appendFileSync(path, `${thirdLine.slice(10)}\n`, 'utf-8');
    const rest = store.readFrom(3);
    expect(rest.signals.map((signal) => signal.source)).toEqual(['carol']);
    expect(rest.nextCursor).toBe(4);
  });

  it('refuses duplicate ids', () => {
    const store = new SignalStore(join(tempDir('store'), 'alpha.jsonl'));
    const signal = makeSignal({ source: 'alice' });

    expect(store.append(signal)).toBe(true);
    expect(store.append(signal)).toBe(false);
    expect(store.count()).toBe(1);
    expect(new SignalStore(store.path).has(signal.id)).toBe(true);
  });

  it('lists the most recent signals', () => {
    const store = new SignalStore(join(tempDir('store'), 'alpha.jsonl'));
    for (const source of ['a', 'b', 'c']) {
      store.append(makeSignal({ source }));
    }

    expect(store.listRecent(2).map((signal) => signal.source)).toEqual(['b', 'c']);
  });
});
