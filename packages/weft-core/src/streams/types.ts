// Stream identity type definitions

/** Wire-visible stream number: an unsigned 31-bit integer. */
export type NetworkStreamId = number;

/** Stream 0 carries connection-level control frames. */
export const ROOT_NETWORK_STREAM_ID: NetworkStreamId = 0;

/** Largest stream number the 31-bit wire field can carry. */
export const MAX_NETWORK_STREAM_ID: NetworkStreamId = 0x7fff_ffff;

/** Connection role - determines stream ID parity. */
export const Role = {
  /** Initiator (client) uses odd stream IDs (1, 3, 5, ...). */
  Initiator: "initiator",
  /** Acceptor (server) uses even stream IDs (2, 4, 6, ...). */
  Acceptor: "acceptor",
} as const;
export type Role = (typeof Role)[keyof typeof Role];

export type StreamIdErrorKind = "invalidId" | "reservedId" | "alreadyBound" | "collision" | "exhausted";

/**
 * Error types for stream identity operations.
 *
 * Every kind is a logic error in the calling engine. The connection that
 * raised it must not keep using its registry.
 */
export class StreamIdError extends Error {
  constructor(
    public kind: StreamIdErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "StreamIdError";
  }

  static invalidId(value: number): StreamIdError {
    return new StreamIdError("invalidId", `invalid stream ID: ${value} (expected an unsigned 31-bit integer)`);
  }

  static reservedId(): StreamIdError {
    return new StreamIdError("reservedId", "stream 0 is reserved for the root stream");
  }

  static alreadyBound(current: NetworkStreamId, requested: NetworkStreamId): StreamIdError {
    return new StreamIdError("alreadyBound", `stream already bound to ${current}, cannot bind to ${requested}`);
  }

  static collision(networkId: NetworkStreamId): StreamIdError {
    return new StreamIdError("collision", `stream ID ${networkId} is already mapped to another stream`);
  }

  static exhausted(role: Role): StreamIdError {
    return new StreamIdError("exhausted", `no stream IDs left for ${role}`);
  }
}

/** Check that a value fits the 31-bit stream identifier field. */
export function isValidNetworkStreamId(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_NETWORK_STREAM_ID;
}
