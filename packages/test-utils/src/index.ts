/**
 * @chesslab/test-utils
 *
 * Shared test utilities for chesslab
 */

// Fixture loading
export { loadPgnSync } from './fixtures/loader.js';

// Move providers
export {
  createMockEngine,
  createDeferredEngine,
  type MockEngine,
  type MockEngineConfig,
  type DeferredEngine,
  type PendingRequest,
} from './mocks/mock-engine.js';

export {
  createMockAdvisor,
  createDeferredAdvisor,
  type MockAdvisor,
  type MockAdvisorConfig,
  type DeferredAdvisor,
} from './mocks/mock-advisor.js';

// UCI engine process
export {
  FakeUciProcess,
  createFakeUciSpawn,
  type FakeUciProcessConfig,
} from './mocks/fake-uci-process.js';
