/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { FakeInstrumentServer, FakeChannelFactory } from '@/__testutils__/index.js';
 * ```
 */

export { assertEventually } from './assertions.js';
export { FakeChannel, FakeChannelFactory, type ScriptedOutcome } from './FakeChannel.js';
export {
  FAKE_SERVER_HOST,
  FakeInstrumentServer,
  echoHandler,
  type FakeServerMode,
  type RequestHandler,
} from './FakeInstrumentServer.js';
export { createTempDir, removeTempDir } from './tempDir.js';
