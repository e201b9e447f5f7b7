import type { WirePayload } from "./failure"

/**
 * PayloadCodec converts user values (failure details, heartbeat details,
 * encoded attributes) to and from wire payloads.
 *
 * @remarks
 * The failure converter treats payloads as opaque: it never inspects `data`
 * and never validates decoded values. Codecs should be pure, deterministic
 * transforms.
 */
export interface PayloadCodec {
  encode(value: unknown): WirePayload

  /**
   * Decode a payload. A payload this codec does not recognize should be
   * returned as-is rather than rejected.
   */
  decode(payload: WirePayload): unknown
}
