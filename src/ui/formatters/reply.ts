/**
 * Human-readable output for `instrument-client ask`.
 */

import type { SessionDiagnostic } from '@/client/index.js';
import { OutputFormatter, formatValue } from '@/ui/formatting.js';

export interface AskResultData {
  address: string;
  reply: unknown;
  diagnostics: SessionDiagnostic[];
}

/**
 * Format a reply, followed by any diagnostics the session recorded.
 *
 * @example
 * ```
 * pong
 *
 * Diagnostics:
 *   [text] Instrument busy
 * ```
 */
export function formatAskResult(data: AskResultData): string {
  const output = new OutputFormatter().text(formatValue(data.reply));
  if (data.diagnostics.length === 0) {
    return output.build();
  }

  output.blank().text('Diagnostics:');
  for (const diagnostic of data.diagnostics) {
    output.indent(`[${diagnostic.kind}] ${diagnostic.message}`);
  }
  return output.build();
}
