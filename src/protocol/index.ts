export {
  decodeEnvelopeError,
  decodeResponseEnvelope,
  describeEnvelopeError,
  encodeResponseEnvelope,
  type EnvelopeError,
  type EnvelopeErrorKind,
  type ResponseEnvelope,
  type ResponseFrame,
  type ServerException,
} from './envelope.js';
