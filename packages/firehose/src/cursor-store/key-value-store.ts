/**
 * KeyValueCursorStore - CursorStore backed by an `@effect/platform`
 * KeyValueStore, such as the file system or browser storage.
 *
 * @module
 */
import * as KeyValueStore from "@effect/platform/KeyValueStore"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import type { Cursor } from "../core/domain.ts"
import { CursorStoreError } from "./errors.ts"
import { CursorStore, type CursorStoreService } from "./service.ts"

export const KEY_PREFIX = "firehose/cursor/"

const make = Effect.gen(function*() {
  const store = yield* KeyValueStore.KeyValueStore

  const storageKey = (key: string) => `${KEY_PREFIX}${key}`

  const load = (key: string) =>
    store.get(storageKey(key)).pipe(
      Effect.mapError((cause) =>
        new CursorStoreError({ reason: "Could not read cursor", operation: "load", key, cause })
      )
    )

  const save = (key: string, cursor: Cursor) =>
    store.set(storageKey(key), cursor).pipe(
      Effect.mapError((cause) =>
        new CursorStoreError({ reason: "Could not write cursor", operation: "save", key, cause })
      )
    )

  const clear = (key: string) =>
    store.remove(storageKey(key)).pipe(
      Effect.mapError((cause) =>
        new CursorStoreError({ reason: "Could not remove cursor", operation: "clear", key, cause })
      )
    )

  return { load, save, clear } satisfies CursorStoreService
})

/**
 * Layer providing a CursorStore on top of the KeyValueStore in context.
 */
export const layer: Layer.Layer<CursorStore, never, KeyValueStore.KeyValueStore> = Layer.effect(CursorStore, make)
