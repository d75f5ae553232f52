export interface ProxyResolution {
  asset: string;
  tradableAsset: string;
  proxied: boolean;
}

/** Maps an asset named in a thesis to the instrument that can actually be traded. */
export interface ProxyResolver {
  resolve(asset: string): ProxyResolution | null;
}

export interface ProxyMapConfig {
  /** asset -> tradable instrument; null marks an asset with no tradable proxy. */
  map: Record<string, string | null>;
  /** Used for assets missing from the map; null skips them. */
  fallback: string | null;
}

export class ConfigProxyResolver implements ProxyResolver {
  private readonly map: Map<string, string | null>;

  constructor(private readonly config: ProxyMapConfig) {
    this.map = new Map(
      Object.entries(config.map).map(([asset, target]) => [
        asset.trim().toUpperCase(),
        target ? target.trim().toUpperCase() : null,
      ])
    );
  }

  resolve(asset: string): ProxyResolution | null {
    const symbol = asset.trim().toUpperCase();
    const target = this.map.has(symbol) ? this.map.get(symbol) : this.config.fallback?.toUpperCase();
    if (!target) {
      return null;
    }
    return { asset: symbol, tradableAsset: target, proxied: target !== symbol };
  }
}
