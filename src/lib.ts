/**
 * Library entry point.
 *
 * ```typescript
 * import { ClientSession, sendRequest, loadConfig } from 'instrument-client';
 * ```
 */

export * from '@/client/index.js';
export * from '@/config/index.js';
export * from '@/protocol/index.js';
export * from '@/transport/index.js';
export { EXIT_CODES } from '@/utils/exitCodes.js';
