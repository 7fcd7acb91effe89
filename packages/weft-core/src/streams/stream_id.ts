// Abstract stream handles.

import { type NetworkStreamId, ROOT_NETWORK_STREAM_ID, StreamIdError } from "./types.ts";

/**
 * Binding hook, keyed by a symbol the package index does not export so that
 * only StreamRegistry can reach it.
 */
export const bindNetworkId = Symbol("weft:stream-id:bind");

/** Constructor for handles whose network ID is known up front. Registry-only. */
export const knownStreamId = Symbol("weft:stream-id:known");

type StreamIdState = { kind: "unbound" } | { kind: "bound"; networkId: NetworkStreamId };

let nextSerial = 0;

/**
 * A handle to one stream on a connection.
 *
 * A handle can exist before the stream has a number on the wire: locally
 * initiated streams are created abstract and get their number later, when the
 * engine actually sends them. Handles compare by identity only, so two streams
 * that are both still unnumbered are never mistaken for one another, and a
 * handle stays the same object once its number is known.
 *
 * There is no way to make a handle from a bare number outside the registry;
 * use `StreamRegistry.resolve()` for IDs read off the wire.
 *
 * @example
 * ```typescript
 * const stream = StreamId.create();
 * stream.networkId; // null
 * const id = allocator.next();
 * registry.bindNetworkId(stream, id);
 * registry.resolve(id) === stream; // true
 * ```
 */
export class StreamId {
  /**
   * The root stream, stream 0.
   *
   * It is bound at construction and never rebound, so the one instance is safe
   * to share between all connections.
   */
  static readonly root: StreamId = StreamId[knownStreamId](ROOT_NETWORK_STREAM_ID);

  /** Creation order, for debug output only. Never used for equality. */
  readonly serial: number;

  private state: StreamIdState;

  private constructor(state: StreamIdState) {
    this.state = state;
    this.serial = nextSerial++;
  }

  /** Create an abstract handle that has not reached the network yet. */
  static create(): StreamId {
    return new StreamId({ kind: "unbound" });
  }

  static [knownStreamId](networkId: NetworkStreamId): StreamId {
    return new StreamId({ kind: "bound", networkId });
  }

  /** The stream ID used on the network, or null if it has none yet. */
  get networkId(): NetworkStreamId | null {
    return this.state.kind === "bound" ? this.state.networkId : null;
  }

  get isBound(): boolean {
    return this.state.kind === "bound";
  }

  /** Identity comparison; same as `===`. */
  equals(other: StreamId): boolean {
    return this === other;
  }

  [bindNetworkId](networkId: NetworkStreamId): void {
    if (this.state.kind === "bound") {
      throw StreamIdError.alreadyBound(this.state.networkId, networkId);
    }
    this.state = { kind: "bound", networkId };
  }

  toString(): string {
    return this.state.kind === "bound"
      ? `StreamId(#${this.serial}, network ${this.state.networkId})`
      : `StreamId(#${this.serial}, unbound)`;
  }
}

/** Shared handle for stream 0. */
export const ROOT_STREAM: StreamId = StreamId.root;
