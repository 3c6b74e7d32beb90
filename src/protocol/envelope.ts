/**
 * Response Envelope
 *
 * Wire contract for server replies and its decoder. The error descriptor is
 * resolved into a tagged union here, once, so the session never inspects raw
 * payload shapes.
 *
 * Wire form:
 * ```json
 * { "message": <any>, "error": null }
 * { "message": <any>, "error": "text error" }
 * { "message": <any>, "error": { "warning": "text" } }
 * { "message": <any>, "error": { "exception": { "kind": "ValueError", "detail": "..." } } }
 * ```
 * Any other `error` value decodes as `unrecognized`.
 */

/**
 * Structured description of an exception raised on the server.
 * Exceptions never travel as executable objects.
 */
export interface ServerException {
  /** Exception class or category name reported by the server */
  kind: string;
  /** Human-readable detail */
  detail: string;
}

export type EnvelopeError =
  | { kind: 'text'; text: string }
  | { kind: 'warning'; text: string }
  | { kind: 'exception'; exception: ServerException }
  | { kind: 'unrecognized'; raw: unknown };

export type EnvelopeErrorKind = EnvelopeError['kind'];

/**
 * Decoded server reply.
 */
export interface ResponseEnvelope {
  message: unknown;
  error: EnvelopeError | null;
}

/**
 * Reply frame exactly as it travels on the wire.
 */
export interface ResponseFrame {
  message?: unknown;
  error?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOnlyKey(value: Record<string, unknown>, key: string): boolean {
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === key;
}

function decodeException(raw: unknown): ServerException | null {
  if (!isRecord(raw)) {
    return null;
  }
  const kind = raw['kind'];
  const detail = raw['detail'];
  if (typeof kind !== 'string') {
    return null;
  }
  if (detail === undefined) {
    return { kind, detail: '' };
  }
  return typeof detail === 'string' ? { kind, detail } : null;
}

/**
 * Classify a raw `error` field.
 *
 * @returns null when the reply carries no error
 *
 * @example
 * ```typescript
 * decodeEnvelopeError('Instrument busy');
 * // { kind: 'text', text: 'Instrument busy' }
 * decodeEnvelopeError({ warning: 'Parameter clipped to range' });
 * // { kind: 'warning', text: 'Parameter clipped to range' }
 * ```
 */
export function decodeEnvelopeError(raw: unknown): EnvelopeError | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === 'string') {
    return { kind: 'text', text: raw };
  }
  if (isRecord(raw)) {
    const warning = raw['warning'];
    if (hasOnlyKey(raw, 'warning') && typeof warning === 'string') {
      return { kind: 'warning', text: warning };
    }
    if (hasOnlyKey(raw, 'exception')) {
      const exception = decodeException(raw['exception']);
      if (exception) {
        return { kind: 'exception', exception };
      }
    }
  }
  return { kind: 'unrecognized', raw };
}

/**
 * Decode a parsed reply frame.
 *
 * Objects are envelopes (`message` defaults to undefined). Any other JSON value
 * is a bare message without an error.
 */
export function decodeResponseEnvelope(frame: unknown): ResponseEnvelope {
  if (!isRecord(frame)) {
    return { message: frame, error: null };
  }
  return {
    message: frame['message'],
    error: decodeEnvelopeError(frame['error']),
  };
}

/**
 * Encode an envelope to its wire form. Used by servers and test doubles.
 */
export function encodeResponseEnvelope(envelope: ResponseEnvelope): ResponseFrame {
  const { message, error } = envelope;
  if (!error) {
    return { message, error: null };
  }
  switch (error.kind) {
    case 'text':
      return { message, error: error.text };
    case 'warning':
      return { message, error: { warning: error.text } };
    case 'exception':
      return { message, error: { exception: { ...error.exception } } };
    case 'unrecognized':
      return { message, error: error.raw };
  }
}

/**
 * Short single-line rendering of an envelope error for logs and messages.
 */
export function describeEnvelopeError(error: EnvelopeError): string {
  switch (error.kind) {
    case 'text':
    case 'warning':
      return error.text;
    case 'exception':
      return error.exception.detail
        ? `${error.exception.kind}: ${error.exception.detail}`
        : error.exception.kind;
    case 'unrecognized':
      return describeRawValue(error.raw);
  }
}

function describeRawValue(raw: unknown): string {
  try {
    const json = JSON.stringify(raw);
    return typeof json === 'string' ? json : String(raw);
  } catch {
    return String(raw);
  }
}
