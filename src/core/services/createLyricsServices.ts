import type { AppConfig } from '../config/AppConfig';
import type { LyricsCache } from '../interfaces/LyricsCache';
import type { LyricsProvider } from '../interfaces/LyricsProvider';
import { DEFAULT_DECORATION_RULES } from '../config/decorationRules';
import { FileLyricsCache } from '../cache/FileLyricsCache';
import { LRCLibNetworkProvider } from '../providers/LRCLibNetworkProvider';
import { LyricsManager } from './LyricsManager';
import { LyricsResolver } from './LyricsResolver';
import { TimestampScaler } from './TimestampScaler';
import { TitleNormalizer } from './TitleNormalizer';

export interface LyricsServices {
    normalizer: TitleNormalizer;
    manager: LyricsManager;
    provider: LyricsProvider;
    cache: LyricsCache;
}

export interface ServiceOverrides {
    provider?: LyricsProvider;
    cache?: LyricsCache;
}

/**
 * Wires the lyrics pipeline from configuration.
 */
export function createLyricsServices(config: AppConfig, overrides: ServiceOverrides = {}): LyricsServices {
    const provider = overrides.provider ?? new LRCLibNetworkProvider({
        apiBase: config.lyricsApiBase,
        timeoutMs: config.requestTimeoutMs
    });
    const cache = overrides.cache ?? new FileLyricsCache(config.cacheDir);
    const normalizer = new TitleNormalizer([...DEFAULT_DECORATION_RULES, ...config.extraDecorationRules]);
    const manager = new LyricsManager(
        new LyricsResolver(provider, config.resolver),
        new TimestampScaler(config.scaler),
        cache,
        config.cache.bucketSeconds
    );

    return { normalizer, manager, provider, cache };
}
