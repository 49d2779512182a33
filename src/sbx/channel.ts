import type { CapabilityReply } from "../contracts/sbx/worker-message.schema";

/**
 * Shared-memory mailbox for synchronous capability calls from a sandbox
 * worker. Layout: Int32 [state, length] header, then the JSON reply bytes.
 *
 * A call starts PENDING. The host must move it to CLAIMED before running the
 * capability, and the worker may only give up by moving it to ABANDONED; both
 * moves are compare-and-exchange on PENDING, so a call is either executed and
 * answered or never executed at all.
 */
export const CHANNEL_PAYLOAD_BYTES = 64 * 1024;
const HEADER_BYTES = 8;

export const STATE_PENDING = 0;
export const STATE_READY = 1;
export const STATE_CLAIMED = 2;
export const STATE_ABANDONED = 3;

export type Channel = {
  header: Int32Array;
  payload: Uint8Array;
};

export function createChannelBuffer(): SharedArrayBuffer {
  return new SharedArrayBuffer(HEADER_BYTES + CHANNEL_PAYLOAD_BYTES);
}

export function openChannel(buffer: SharedArrayBuffer): Channel {
  return {
    header: new Int32Array(buffer, 0, 2),
    payload: new Uint8Array(buffer, HEADER_BYTES)
  };
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Host side: publish a reply and wake the worker. */
export function writeReply(channel: Channel, reply: CapabilityReply): void {
  let bytes = encoder.encode(JSON.stringify(reply));
  if (bytes.length > CHANNEL_PAYLOAD_BYTES) {
    bytes = encoder.encode(
      JSON.stringify({
        ok: false,
        name: "RangeError",
        error: `capability reply exceeds ${CHANNEL_PAYLOAD_BYTES} bytes`
      })
    );
  }
  channel.payload.set(bytes);
  Atomics.store(channel.header, 1, bytes.length);
  Atomics.store(channel.header, 0, STATE_READY);
  Atomics.notify(channel.header, 0);
}

/** Worker side: decode the reply the host published. */
export function readReply(channel: Channel): unknown {
  const length = Atomics.load(channel.header, 1);
  // slice copies out of shared memory; TextDecoder refuses shared views
  return JSON.parse(decoder.decode(channel.payload.slice(0, length)));
}

/** Host side: take ownership of a pending call. False when the worker already gave up on it. */
export function claimCall(channel: Channel): boolean {
  return Atomics.compareExchange(channel.header, 0, STATE_PENDING, STATE_CLAIMED) === STATE_PENDING;
}

/**
 * Worker side: park until the host answers the call in flight. Returns
 * "abandoned" when `waitMs` ran out before the host claimed it; once claimed,
 * the reply is waited for regardless of `waitMs`.
 */
export function awaitReply(channel: Channel, waitMs: number): "ready" | "abandoned" {
  const { header } = channel;
  if (waitMs > 0) Atomics.wait(header, 0, STATE_PENDING, waitMs);
  if (Atomics.compareExchange(header, 0, STATE_PENDING, STATE_ABANDONED) === STATE_PENDING) {
    return "abandoned";
  }
  while (Atomics.load(header, 0) === STATE_CLAIMED) {
    Atomics.wait(header, 0, STATE_CLAIMED);
  }
  return "ready";
}
