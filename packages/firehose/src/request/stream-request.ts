/**
 * The streaming request.
 *
 * @module
 */
import * as Schema from "effect/Schema"
import { Cursor, Payload, StartBlockNumber, Uint64 } from "../core/domain.ts"

/**
 * Parameters of a block stream.
 *
 * There is no dedicated constructor: build the default value and override the
 * fields you need. The default streams from block `0` with no upper bound.
 *
 * When both `cursor` and `startBlockNum` are set, the server resumes from the
 * cursor and ignores `startBlockNum`. This combination is accepted as is.
 *
 * @example
 * ```typescript
 * const request = new Request({ startBlockNum: 17_000_000n, stopBlockNum: 17_000_100n })
 * ```
 */
export class Request extends Schema.Class<Request>("Firehose/Request")({
  /**
   * First block to stream. Negative values are relative to the chain head.
   */
  startBlockNum: Schema.optionalWith(StartBlockNumber, { default: () => 0n }),
  /**
   * Resumption point taken from a previously received response.
   */
  cursor: Schema.optionalWith(Cursor, { default: () => "" }),
  /**
   * Last block to stream, inclusive. `0` means unbounded.
   */
  stopBlockNum: Schema.optionalWith(Uint64, { default: () => 0n }),
  /**
   * Only stream irreversible blocks.
   */
  finalBlocksOnly: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  /**
   * Server-side transforms, as opaque payloads.
   */
  transforms: Schema.optionalWith(Schema.Array(Payload), { default: () => [] })
}) {
  get hasCursor(): boolean {
    return this.cursor.length > 0
  }

  get isBounded(): boolean {
    return this.stopBlockNum > 0n
  }

  /**
   * Returns a copy of this request which resumes from `cursor`. The start
   * block is left untouched.
   */
  withCursor(cursor: Cursor): Request {
    return new Request({
      startBlockNum: this.startBlockNum,
      cursor,
      stopBlockNum: this.stopBlockNum,
      finalBlocksOnly: this.finalBlocksOnly,
      transforms: this.transforms
    })
  }
}
