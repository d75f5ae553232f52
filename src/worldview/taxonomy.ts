import type { SectorOf } from './synthesizer.js';

export interface SectorTaxonomyConfig {
  sectors: Record<string, string[]>;
  defaultSector: string;
}

/** Maps an asset to the sector its theses aggregate under. */
export interface SectorTaxonomy {
  sectorOf: SectorOf;
  sectors(): string[];
}

export function createSectorTaxonomy(config: SectorTaxonomyConfig): SectorTaxonomy {
  const bySymbol = new Map<string, string>();
  for (const [sector, assets] of Object.entries(config.sectors)) {
    for (const asset of assets) {
      const symbol = asset.trim().toUpperCase();
      // First listing wins when an asset appears under two sectors.
      if (symbol && !bySymbol.has(symbol)) {
        bySymbol.set(symbol, sector);
      }
    }
  }
  return {
    sectorOf: (asset) => bySymbol.get(asset.trim().toUpperCase()) ?? config.defaultSector,
    sectors: () => Object.keys(config.sectors),
  };
}
