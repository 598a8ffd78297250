/**
 * File Writer Service
 *
 * Writes emitted modules to disk under the output directory. A file whose
 * content is already up to date is left untouched.
 */
import { Effect } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { WriteError } from "../errors.js"
import type { EmittedFile } from "./code-emitter.js"

export interface WriteOptions {
  readonly outputDir: string
  /** Report what would be written without touching the disk */
  readonly dryRun?: boolean
}

export interface WriteResult {
  /** Absolute or outputDir-joined path of the file */
  readonly path: string
  /** The file was created or its content changed */
  readonly written: boolean
}

export interface FileWriter {
  readonly writeAll: (
    files: readonly EmittedFile[],
    options: WriteOptions,
  ) => Effect.Effect<readonly WriteResult[], WriteError, FileSystem.FileSystem | Path.Path>
}

export function createFileWriter(): FileWriter {
  return {
    writeAll: (files, options) =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const path = yield* Path.Path

        return yield* Effect.forEach(files, file =>
          Effect.gen(function* () {
            const target = path.join(options.outputDir, file.path)
            const fail = (cause: unknown) =>
              new WriteError({ message: `Failed to write ${target}`, path: target, cause })

            const exists = yield* fs.exists(target).pipe(Effect.mapError(fail))
            const current = exists ? yield* fs.readFileString(target).pipe(Effect.mapError(fail)) : undefined
            if (current === file.content) {
              return { path: target, written: false }
            }
            if (options.dryRun) {
              return { path: target, written: true }
            }

            yield* fs.makeDirectory(path.dirname(target), { recursive: true }).pipe(Effect.mapError(fail))
            yield* fs.writeFileString(target, file.content).pipe(Effect.mapError(fail))
            return { path: target, written: true }
          }),
        )
      }),
  }
}
