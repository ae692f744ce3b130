import { createOpponentService } from '../../../src/server/game/ai/opponentServiceFactory';
import { LocalOpponentService } from '../../../src/server/game/ai/LocalOpponentService';
import { MockOpponentService } from '../../../src/server/game/ai/MockOpponentService';
import { RemoteOpponentService } from '../../../src/server/game/ai/RemoteOpponentService';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('createOpponentService', () => {
  it('builds a local adapter that honours fast mode', () => {
    const service = createOpponentService({ kind: 'local', timeoutMs: 5000, fastMode: true });

    expect(service).toBeInstanceOf(LocalOpponentService);
    if (service instanceof LocalOpponentService) {
      expect(service.getThinkingTime('hard')).toBe(0);
    }
  });

  it('builds a mock adapter', () => {
    const service = createOpponentService({ kind: 'mock', timeoutMs: 5000, fastMode: true });

    expect(service).toBeInstanceOf(MockOpponentService);
    if (service instanceof MockOpponentService) {
      expect(service.getConfig().responseTimeMs).toBe(0);
    }
  });

  it('builds a remote adapter when a URL is configured', () => {
    const service = createOpponentService({
      kind: 'remote',
      url: 'http://opponent.test',
      timeoutMs: 5000,
      fastMode: false,
    });

    expect(service).toBeInstanceOf(RemoteOpponentService);
    expect(service.kind).toBe('remote');
  });

  it('refuses a remote adapter without a URL', () => {
    expect(() =>
      createOpponentService({ kind: 'remote', timeoutMs: 5000, fastMode: false })
    ).toThrow('AI_SERVICE_URL is required when the opponent service type is remote');
  });
});
