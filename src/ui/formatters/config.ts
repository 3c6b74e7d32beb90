/**
 * Human-readable output for `instrument-client split-config`.
 */

import type { LoadedConfig } from '@/config/index.js';
import { OutputFormatter } from '@/ui/formatting.js';

/**
 * One line per instrument with its GUI class and server fields, then the
 * residual file path.
 */
export function formatSplitConfig(config: LoadedConfig): string {
  const names = Object.keys(config.fullConfig);
  const output = new OutputFormatter().text(`Instruments: ${names.length}`);

  for (const name of names) {
    const gui = config.guiConfig[name];
    const server = config.serverConfig[name] ?? {};
    output.blank().text(name);
    output.keyValueList(
      [
        ['gui', gui ? gui.type : '(none)'],
        ...Object.entries(server).map(([field, value]): [string, string] => [
          field,
          JSON.stringify(value),
        ]),
      ],
      14
    );
  }

  return output.blank().keyValue('Residual config', config.residualPath).build();
}
