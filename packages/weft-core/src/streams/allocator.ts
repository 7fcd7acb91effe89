// Stream ID allocator with correct parity based on role.

import {
  type NetworkStreamId,
  MAX_NETWORK_STREAM_ID,
  ROOT_NETWORK_STREAM_ID,
  Role,
  StreamIdError,
  isValidNetworkStreamId,
} from "./types.ts";

/**
 * Allocates monotonically increasing stream IDs with correct parity.
 *
 * Initiator uses odd IDs, Acceptor uses even. The registry never calls this;
 * it is one allocation policy a connection can pair with it.
 */
export class StreamIdAllocator {
  private nextId: NetworkStreamId;

  constructor(readonly role: Role) {
    this.nextId = role === Role.Initiator ? 1 : 2;
  }

  /**
   * Allocate the next stream ID.
   *
   * @throws StreamIdError `exhausted` once the 31-bit space for this role is used up.
   */
  next(): NetworkStreamId {
    if (this.nextId > MAX_NETWORK_STREAM_ID) {
      throw StreamIdError.exhausted(this.role);
    }
    const id = this.nextId;
    this.nextId += 2;
    return id;
  }

  /**
   * Skip every ID up to and including `networkId`.
   *
   * For streams that were opened implicitly, such as stream 1 after an
   * HTTP/1.1 upgrade. Never moves the allocator backwards.
   */
  advancePast(networkId: NetworkStreamId): void {
    if (!isValidNetworkStreamId(networkId)) {
      throw StreamIdError.invalidId(networkId);
    }
    let candidate = networkId + 1;
    const odd = this.role === Role.Initiator;
    if ((candidate % 2 === 1) !== odd) {
      candidate += 1;
    }
    if (candidate > this.nextId) {
      this.nextId = candidate;
    }
  }

  /** The ID `next()` would return, or null when exhausted. */
  peek(): NetworkStreamId | null {
    return this.nextId > MAX_NETWORK_STREAM_ID ? null : this.nextId;
  }
}

/**
 * Which role opened a stream, judging by the parity of its ID.
 *
 * Returns null for the root stream, which neither side opens.
 */
export function initiatorOf(networkId: NetworkStreamId): Role | null {
  if (!isValidNetworkStreamId(networkId)) {
    throw StreamIdError.invalidId(networkId);
  }
  if (networkId === ROOT_NETWORK_STREAM_ID) return null;
  return networkId % 2 === 1 ? Role.Initiator : Role.Acceptor;
}
