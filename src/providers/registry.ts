import type { MarketDataProvider, ProviderConfig, ProviderOptions } from './types';
import { InMemoryProvider } from './in_memory_provider';
import { ReplayProvider } from './replay_provider';
import { SimulatedProvider } from './simulated_provider';

/**
 * Create the market data provider named by configuration. `options.clock` is
 * read by providers that cut a poll short at its deadline.
 *
 * ENV:
 * - SCANNER_PROVIDER overrides the configured type (see core/config)
 */
export function createProvider(
  config: ProviderConfig,
  options: ProviderOptions = {}
): MarketDataProvider {
  switch (config.type) {
    case 'memory':
      return new InMemoryProvider();
    case 'replay':
      return ReplayProvider.fromConfig(config);
    case 'simulated':
      return new SimulatedProvider(config, options);
    default: {
      const unknownType: never = config;
      throw new Error(`Unknown provider type: ${JSON.stringify(unknownType)}`);
    }
  }
}
