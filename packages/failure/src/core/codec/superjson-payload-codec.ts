import superjson from "superjson"
import type { WirePayload } from "../../ports/failure"
import type { PayloadCodec } from "../../ports/payload-codec"
import { isRecord } from "../utils/is-record"

export const ENCODING_METADATA_KEY = "encoding"
export const SUPERJSON_ENCODING = "json/superjson"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

function isWirePayload(value: unknown): value is WirePayload {
  return (
    isRecord(value) &&
    value.data instanceof Uint8Array &&
    isRecord(value.metadata) &&
    Object.values(value.metadata).every((v) => v instanceof Uint8Array)
  )
}

/**
 * Default payload codec. Values are serialized with superjson so that `Date`,
 * `Map`, `Set` and `BigInt` details survive the round trip.
 *
 * Payloads written with any other encoding are returned untouched by
 * `decode`, and `encode` passes such a payload through as it is.
 */
export class SuperjsonPayloadCodec implements PayloadCodec {
  encode(value: unknown): WirePayload {
    if (isWirePayload(value)) return value

    return {
      metadata: { [ENCODING_METADATA_KEY]: encoder.encode(SUPERJSON_ENCODING) },
      data: encoder.encode(superjson.stringify(value)),
    }
  }

  decode(payload: WirePayload): unknown {
    const encoding = payload.metadata[ENCODING_METADATA_KEY]

    if (!encoding || decoder.decode(encoding) !== SUPERJSON_ENCODING) {
      return payload
    }

    return superjson.parse(decoder.decode(payload.data))
  }
}

export function createSuperjsonPayloadCodec(): PayloadCodec {
  return new SuperjsonPayloadCodec()
}
