import type { OpponentServiceSettings } from '../../config';
import { LocalOpponentService } from './LocalOpponentService';
import { MockOpponentService } from './MockOpponentService';
import { OpponentService, OpponentServiceError } from './OpponentService';
import { RemoteOpponentService } from './RemoteOpponentService';

/**
 * Build the adapter described by one `opponent.primary`/`opponent.fallback`
 * config block.
 *
 * @throws OpponentServiceError CONFIGURATION_ERROR for a remote adapter
 *   without a URL
 */
export function createOpponentService(settings: OpponentServiceSettings): OpponentService {
  switch (settings.kind) {
    case 'local':
      return new LocalOpponentService({
        fastMode: settings.fastMode,
        timeoutMs: settings.timeoutMs,
      });
    case 'mock':
      return new MockOpponentService({ responseTimeMs: settings.fastMode ? 0 : 100 });
    case 'remote':
      if (!settings.url) {
        throw new OpponentServiceError(
          'CONFIGURATION_ERROR',
          'AI_SERVICE_URL is required when the opponent service type is remote'
        );
      }
      return new RemoteOpponentService({ baseURL: settings.url, timeoutMs: settings.timeoutMs });
  }
}
