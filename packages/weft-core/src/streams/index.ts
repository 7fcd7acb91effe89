// Streams module exports

export {
  type NetworkStreamId,
  type StreamIdErrorKind,
  ROOT_NETWORK_STREAM_ID,
  MAX_NETWORK_STREAM_ID,
  Role,
  StreamIdError,
  isValidNetworkStreamId,
} from "./types.ts";
export { StreamId, ROOT_STREAM } from "./stream_id.ts";
export { StreamRegistry, type StreamRegistryOptions } from "./registry.ts";
export { StreamIdAllocator, initiatorOf } from "./allocator.ts";
