// @weft/core - stream identity for multiplexed connections.
//
// Handles let a connection refer to a stream before its network ID is known;
// the per-connection registry binds handles to IDs exactly once.

export {
  type NetworkStreamId,
  type StreamIdErrorKind,
  type StreamRegistryOptions,
  ROOT_NETWORK_STREAM_ID,
  MAX_NETWORK_STREAM_ID,
  ROOT_STREAM,
  Role,
  StreamId,
  StreamIdAllocator,
  StreamIdError,
  StreamRegistry,
  initiatorOf,
  isValidNetworkStreamId,
} from "./streams/index.ts";

// Debug tracing
export { type Tracer, createTracer, isEnabled, matchPattern } from "./logging.ts";
