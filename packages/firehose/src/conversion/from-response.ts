/**
 * The conversion contract between responses and domain block types.
 *
 * A decoder turns the opaque payload of a response into a typed block. It is
 * a pure function which reports every problem as a value: a block which fails
 * to convert never ends the stream that carried it.
 *
 * @module
 */
import * as Either from "effect/Either"
import { dual } from "effect/Function"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"
import type { Payload } from "../core/domain.ts"
import type { BlockEnvelope } from "../response/response.ts"
import { type ConversionError, MalformedPayloadError, MissingPayloadError, UnexpectedTypeUrlError } from "./errors.ts"

// =============================================================================
// Contract
// =============================================================================

/**
 * Any error which can be rendered for a human.
 */
export interface Displayable {
  readonly message: string
}

/**
 * Converts a response into a block of type `A`, or reports why it cannot.
 *
 * The same decoder serves both streamed responses and single-block fetches.
 */
export interface FromResponse<A, E extends Displayable> {
  readonly fromResponse: (envelope: BlockEnvelope) => Either.Either<A, E>
}

export type Success<D> = D extends FromResponse<infer A, infer _E> ? A : never
export type Failure<D> = D extends FromResponse<infer _A, infer E> ? E : never

export const make = <A, E extends Displayable>(
  fromResponse: (envelope: BlockEnvelope) => Either.Either<A, E>
): FromResponse<A, E> => ({ fromResponse })

/**
 * Transforms the blocks produced by a decoder.
 */
export const map: {
  <A, B>(f: (a: A) => B): <E extends Displayable>(self: FromResponse<A, E>) => FromResponse<B, E>
  <A, E extends Displayable, B>(self: FromResponse<A, E>, f: (a: A) => B): FromResponse<B, E>
} = dual(
  2,
  <A, E extends Displayable, B>(self: FromResponse<A, E>, f: (a: A) => B): FromResponse<B, E> =>
    make((envelope) => Either.map(self.fromResponse(envelope), f))
)

// =============================================================================
// Payload Decoders
// =============================================================================

/**
 * Extracts the payload of a response, optionally checking its type URL.
 */
export const payloadOf = (
  envelope: BlockEnvelope,
  typeUrl?: string
): Either.Either<Payload, MissingPayloadError | UnexpectedTypeUrlError> => {
  const payload = envelope.block
  if (Predicate.isUndefined(payload)) {
    return Either.left(new MissingPayloadError())
  }
  if (Predicate.isNotUndefined(typeUrl) && payload.typeUrl !== typeUrl) {
    return Either.left(new UnexpectedTypeUrlError({ expected: typeUrl, actual: payload.typeUrl }))
  }
  return Either.right(payload)
}

/**
 * Builds a decoder from a function over the raw payload.
 */
export const fromPayload = <A, E extends Displayable>(options: {
  readonly typeUrl?: string | undefined
  readonly decode: (payload: Payload) => Either.Either<A, E>
}): FromResponse<A, E | MissingPayloadError | UnexpectedTypeUrlError> =>
  make((envelope) => Either.flatMap(payloadOf(envelope, options.typeUrl), options.decode))

const utf8 = new TextDecoder("utf-8", { fatal: true })

/**
 * Builds a decoder for payloads holding a UTF-8 JSON document described by
 * `schema`.
 */
export const fromJsonPayload = <A, I>(
  schema: Schema.Schema<A, I>,
  options?: { readonly typeUrl?: string | undefined }
): FromResponse<A, ConversionError> => {
  const decodeJson = Schema.decodeUnknownEither(Schema.parseJson(schema))
  return fromPayload({
    typeUrl: options?.typeUrl,
    decode: (payload) =>
      Either.try({
        try: () => utf8.decode(payload.value),
        catch: () => "payload is not valid UTF-8"
      }).pipe(
        Either.flatMap((text) => Either.mapLeft(decodeJson(text), (error) => error.message)),
        Either.mapLeft((reason) => new MalformedPayloadError({ typeUrl: payload.typeUrl, reason }))
      )
  })
}
