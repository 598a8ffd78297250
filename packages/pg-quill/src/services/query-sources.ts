/**
 * Query Sources
 *
 * Finds the `.sql` files under the queries directory. Paths are reported
 * relative to that directory with `/` separators, sorted, so every later
 * stage sees files in the same order on every platform.
 */
import { Effect, Order, Array as Arr } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { SourceReadError } from "../errors.js"

export interface QuerySource {
  /** Path relative to the queries directory */
  readonly path: string
  readonly text: string
}

const isSqlFile = (name: string) => name.toLowerCase().endsWith(".sql")

/**
 * Read every `.sql` file below `root`, recursively, in path order.
 */
export const readQuerySources = (
  root: string,
): Effect.Effect<readonly QuerySource[], SourceReadError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const fail = (at: string) => (cause: unknown) =>
      new SourceReadError({ message: `Failed to read ${at}`, path: at, cause })

    const entries = yield* fs.readDirectory(root, { recursive: true }).pipe(Effect.mapError(fail(root)))
    const candidates = Arr.sort(
      entries.filter(isSqlFile).map(entry => ({ entry, relative: entry.split(path.sep).join("/") })),
      Order.mapInput(Order.string, (c: { relative: string }) => c.relative),
    )

    const files = yield* Effect.filter(candidates, ({ entry }) =>
      fs.stat(path.join(root, entry)).pipe(
        Effect.map(info => info.type === "File"),
        Effect.mapError(fail(path.join(root, entry))),
      ),
    )

    return yield* Effect.forEach(files, ({ entry, relative }) =>
      fs.readFileString(path.join(root, entry)).pipe(
        Effect.map(text => ({ path: relative, text })),
        Effect.mapError(fail(path.join(root, entry))),
      ),
    )
  })
