import { describe, expect, it } from 'vitest';

import { ConfigProxyResolver } from '../../src/execution/proxy.js';
import { createSectorTaxonomy } from '../../src/worldview/taxonomy.js';

describe('createSectorTaxonomy', () => {
  it('maps listed assets case-insensitively and falls back to the default sector', () => {
    const taxonomy = createSectorTaxonomy({
      sectors: { crypto_ai: ['BTC', 'eth'], defi: ['UNI', 'ETH'] },
      defaultSector: 'trad_equities',
    });

    expect(taxonomy.sectorOf('btc')).toBe('crypto_ai');
    expect(taxonomy.sectorOf('ETH')).toBe('crypto_ai');
    expect(taxonomy.sectorOf('UNI')).toBe('defi');
    expect(taxonomy.sectorOf('NVDA')).toBe('trad_equities');
    expect(taxonomy.sectors()).toEqual(['crypto_ai', 'defi']);
  });
});

describe('ConfigProxyResolver', () => {
  const resolver = new ConfigProxyResolver({
    map: { BTC: 'WBTC', UNI: 'uni', SOL: null },
    fallback: 'WETH',
  });

  it('resolves mapped assets and flags proxies', () => {
    expect(resolver.resolve('btc')).toEqual({ asset: 'BTC', tradableAsset: 'WBTC', proxied: true });
    expect(resolver.resolve('UNI')).toEqual({ asset: 'UNI', tradableAsset: 'UNI', proxied: false });
  });

  it('treats an explicit null as untradable even with a fallback', () => {
    expect(resolver.resolve('SOL')).toBeNull();
  });

  it('routes unmapped assets through the fallback, or skips them without one', () => {
    expect(resolver.resolve('META')).toEqual({ asset: 'META', tradableAsset: 'WETH', proxied: true });
    expect(new ConfigProxyResolver({ map: {}, fallback: null }).resolve('META')).toBeNull();
  });
});
