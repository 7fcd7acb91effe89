// Per-connection registry of stream handles.

import { createTracer, type Tracer } from "../logging.ts";
import { bindNetworkId, knownStreamId, StreamId } from "./stream_id.ts";
import {
  type NetworkStreamId,
  ROOT_NETWORK_STREAM_ID,
  StreamIdError,
  isValidNetworkStreamId,
} from "./types.ts";

export interface StreamRegistryOptions {
  /**
   * Namespace for debug tracing. Defaults to "weft:streams".
   * Tracing is enabled when the DEBUG environment variable matches it.
   */
  namespace?: string;

  /**
   * Connection label added to every trace event, to tell connections apart.
   */
  label?: string;
}

/**
 * Maps network stream IDs to stream handles for one connection.
 *
 * The registry is the only place a handle gets its network ID, either when a
 * locally created handle is bound to a freshly allocated ID, or when a peer's
 * ID is seen for the first time. It always starts out knowing stream 0.
 *
 * Every method is synchronous. A registry belongs to the event loop that owns
 * its connection and must not be handed to another one.
 */
export class StreamRegistry {
  private streams = new Map<NetworkStreamId, StreamId>([[ROOT_NETWORK_STREAM_ID, StreamId.root]]);

  private readonly trace: Tracer;
  private readonly label: string | undefined;

  constructor(options: StreamRegistryOptions = {}) {
    this.trace = createTracer(options.namespace ?? "weft:streams");
    this.label = options.label;
  }

  /** The root stream. The same handle for every registry. */
  get root(): StreamId {
    return StreamId.root;
  }

  /**
   * Bind an abstract handle to the network ID allocated for it.
   *
   * Choosing the ID is the caller's job (see StreamIdAllocator); the registry
   * only refuses IDs that would break the one-to-one mapping. Nothing changes
   * when this throws.
   *
   * @throws StreamIdError `invalidId` or `reservedId` for a bad ID,
   *   `alreadyBound` if the handle has a network ID, `collision` if another
   *   handle holds `networkId`.
   */
  bindNetworkId(streamId: StreamId, networkId: NetworkStreamId): void {
    if (!isValidNetworkStreamId(networkId)) {
      throw StreamIdError.invalidId(networkId);
    }
    if (networkId === ROOT_NETWORK_STREAM_ID) {
      throw StreamIdError.reservedId();
    }
    const current = streamId.networkId;
    if (current !== null) {
      throw StreamIdError.alreadyBound(current, networkId);
    }
    if (this.streams.has(networkId)) {
      throw StreamIdError.collision(networkId);
    }

    streamId[bindNetworkId](networkId);
    this.streams.set(networkId, streamId);
    this.emit("bind", networkId, streamId);
  }

  /**
   * Get the handle for a network ID, creating it on first sight.
   *
   * Used for IDs read from incoming frames. Repeated calls with the same ID
   * return the same handle.
   *
   * @throws StreamIdError `invalidId` if `networkId` is not an unsigned 31-bit integer.
   */
  resolve(networkId: NetworkStreamId): StreamId {
    if (!isValidNetworkStreamId(networkId)) {
      throw StreamIdError.invalidId(networkId);
    }

    const existing = this.streams.get(networkId);
    if (existing) {
      return existing;
    }

    const streamId = StreamId[knownStreamId](networkId);
    this.streams.set(networkId, streamId);
    this.emit("discover", networkId, streamId);
    return streamId;
  }

  /** Look up a network ID without creating a handle. */
  get(networkId: NetworkStreamId): StreamId | undefined {
    return this.streams.get(networkId);
  }

  /** Check if a network ID is mapped. */
  has(networkId: NetworkStreamId): boolean {
    return this.streams.has(networkId);
  }

  /** Check if this exact handle is mapped by this registry. */
  contains(streamId: StreamId): boolean {
    const networkId = streamId.networkId;
    return networkId !== null && this.streams.get(networkId) === streamId;
  }

  /** Number of mapped streams, the root stream included. */
  get size(): number {
    return this.streams.size;
  }

  entries(): IterableIterator<[NetworkStreamId, StreamId]> {
    return this.streams.entries();
  }

  private emit(event: "bind" | "discover", networkId: NetworkStreamId, streamId: StreamId): void {
    const fields: Record<string, unknown> = { networkId, stream: streamId.toString() };
    if (this.label !== undefined) {
      fields.label = this.label;
    }
    this.trace(event, fields);
  }
}
