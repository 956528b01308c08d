/**
 * InMemoryCursorStore - reference implementation of CursorStore.
 *
 * Not crash-safe: cursors are lost with the process.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import type { Cursor } from "../core/domain.ts"
import { CursorStore, type CursorStoreService } from "./service.ts"

const make = (initial: Iterable<readonly [string, Cursor]>) =>
  Effect.gen(function*() {
    const cursors = yield* Ref.make<ReadonlyMap<string, Cursor>>(new Map(initial))

    const load = (key: string) =>
      Ref.get(cursors).pipe(
        Effect.map((map) => Option.fromNullable(map.get(key)))
      )

    const save = (key: string, cursor: Cursor) => Ref.update(cursors, (map) => new Map([...map, [key, cursor]]))

    const clear = (key: string) =>
      Ref.update(cursors, (map) => {
        const next = new Map(map)
        next.delete(key)
        return next
      })

    return { load, save, clear } satisfies CursorStoreService
  })

/**
 * Layer providing InMemoryCursorStore with empty initial state.
 */
export const layer: Layer.Layer<CursorStore> = Layer.effect(CursorStore, make([]))

/**
 * Layer providing InMemoryCursorStore pre-populated with cursors.
 */
export const layerWithCursors = (cursors: Iterable<readonly [string, Cursor]>): Layer.Layer<CursorStore> =>
  Layer.effect(CursorStore, make(cursors))
