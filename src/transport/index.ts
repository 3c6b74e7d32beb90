/**
 * Transport Layer
 *
 * JSONL request/reply channel over TCP, server addresses and transport errors.
 */

export { createAddress, formatAddress, parseAddress, type Address } from './address.js';
export {
  TransportChannel,
  createTransportChannel,
  type Channel,
  type ChannelFactory,
} from './channel.js';
export {
  ChannelClosedError,
  ChannelConnectionError,
  ChannelStateError,
  ChannelTimeoutError,
  FrameEncodeError,
  FrameParseError,
  InvalidAddressError,
  TransportError,
} from './TransportError.js';
