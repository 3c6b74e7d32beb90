/**
 * JSONL Framing
 *
 * Requests and replies travel as one JSON document per line.
 */

import { formatEncodeError, formatParseError } from './errors.js';

/**
 * Accumulates socket chunks and yields complete, non-blank lines.
 */
export class JSONLBuffer {
  private buffer = '';

  process(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.filter((line) => line.trim());
  }

  /**
   * Whether a partial line is waiting for its terminator.
   */
  hasPartialFrame(): boolean {
    return this.buffer.length > 0;
  }

  clear(): void {
    this.buffer = '';
  }
}

/**
 * Parse one JSONL line.
 *
 * @throws FrameParseError if the line is not valid JSON
 */
export function parseJSONLFrame(line: string): unknown {
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch (error) {
    throw formatParseError(error);
  }
}

/**
 * Serialize a value to a JSONL frame (JSON + newline).
 *
 * @throws FrameEncodeError for values JSON cannot represent (undefined,
 * functions, BigInt, circular structures)
 */
export function toJSONLFrame(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (error) {
    throw formatEncodeError(error);
  }
  if (typeof json !== 'string') {
    throw formatEncodeError(`value of type ${typeof value} has no JSON representation`);
  }
  return json + '\n';
}
