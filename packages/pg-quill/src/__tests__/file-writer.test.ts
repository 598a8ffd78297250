/**
 * File Writer Tests
 *
 * Tests for writing emitted modules to disk using real filesystem operations.
 */
import { it, describe, expect } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import type { EmittedFile } from "../services/code-emitter.js"
import { createFileWriter } from "../services/file-writer.js"
import { readQuerySources } from "../services/query-sources.js"

// Provide real Node.js filesystem and path services
const TestLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

describe("FileWriter", () => {
  describe("writeAll", () => {
    it.effect("writes files and creates nested directories", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const pathSvc = yield* Path.Path
        const writer = createFileWriter()

        const tmpDir = yield* fs.makeTempDirectory({ prefix: "file-writer-test-" })

        const files: EmittedFile[] = [
          { path: "users.ts", content: "export type Foo = string;\n" },
          { path: "admin/audit.ts", content: "export {}\n" },
        ]

        try {
          const results = yield* writer.writeAll(files, { outputDir: tmpDir })

          expect(results).toEqual([
            { path: pathSvc.join(tmpDir, "users.ts"), written: true },
            { path: pathSvc.join(tmpDir, "admin/audit.ts"), written: true },
          ])
          expect(yield* fs.readFileString(pathSvc.join(tmpDir, "users.ts"))).toBe("export type Foo = string;\n")
          expect(yield* fs.exists(pathSvc.join(tmpDir, "admin/audit.ts"))).toBe(true)
        } finally {
          yield* fs.remove(tmpDir, { recursive: true })
        }
      }).pipe(Effect.provide(TestLayer))
    )

    it.effect("leaves up-to-date files alone", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const pathSvc = yield* Path.Path
        const writer = createFileWriter()

        const tmpDir = yield* fs.makeTempDirectory({ prefix: "file-writer-test-" })
        const files: EmittedFile[] = [{ path: "users.ts", content: "export {}\n" }]

        try {
          yield* writer.writeAll(files, { outputDir: tmpDir })
          const again = yield* writer.writeAll(files, { outputDir: tmpDir })

          expect(again).toEqual([{ path: pathSvc.join(tmpDir, "users.ts"), written: false }])
        } finally {
          yield* fs.remove(tmpDir, { recursive: true })
        }
      }).pipe(Effect.provide(TestLayer))
    )

    it.effect("overwrites stale files", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const pathSvc = yield* Path.Path
        const writer = createFileWriter()

        const tmpDir = yield* fs.makeTempDirectory({ prefix: "file-writer-test-" })
        const filePath = pathSvc.join(tmpDir, "users.ts")

        try {
          yield* fs.writeFileString(filePath, "// original content")
          const results = yield* writer.writeAll([{ path: "users.ts", content: "// new content" }], {
            outputDir: tmpDir,
          })

          expect(results[0]?.written).toBe(true)
          expect(yield* fs.readFileString(filePath)).toBe("// new content")
        } finally {
          yield* fs.remove(tmpDir, { recursive: true })
        }
      }).pipe(Effect.provide(TestLayer))
    )

    it.effect("dry-run mode reports changes without writing", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem
        const pathSvc = yield* Path.Path
        const writer = createFileWriter()

        const tmpDir = yield* fs.makeTempDirectory({ prefix: "file-writer-test-" })

        try {
          const results = yield* writer.writeAll([{ path: "should-not-exist.ts", content: "// nope" }], {
            outputDir: tmpDir,
            dryRun: true,
          })

          expect(results).toEqual([{ path: pathSvc.join(tmpDir, "should-not-exist.ts"), written: true }])
          expect(yield* fs.exists(pathSvc.join(tmpDir, "should-not-exist.ts"))).toBe(false)
        } finally {
          yield* fs.remove(tmpDir, { recursive: true })
        }
      }).pipe(Effect.provide(TestLayer))
    )

    it.effect("handles an empty file list", () =>
      Effect.gen(function* () {
        const results = yield* createFileWriter().writeAll([], { outputDir: "/tmp/empty" })
        expect(results).toHaveLength(0)
      }).pipe(Effect.provide(TestLayer))
    )
  })
})

describe("readQuerySources", () => {
  it.effect("reads .sql files recursively in path order", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const pathSvc = yield* Path.Path

      const tmpDir = yield* fs.makeTempDirectory({ prefix: "query-sources-test-" })

      try {
        yield* fs.makeDirectory(pathSvc.join(tmpDir, "admin"))
        yield* fs.writeFileString(pathSvc.join(tmpDir, "users.sql"), "--! a : one\nselect 1;\n")
        yield* fs.writeFileString(pathSvc.join(tmpDir, "admin", "audit.sql"), "--! b : one\nselect 2;\n")
        yield* fs.writeFileString(pathSvc.join(tmpDir, "notes.md"), "# not a query")

        const sources = yield* readQuerySources(tmpDir)

        expect(sources).toEqual([
          { path: "admin/audit.sql", text: "--! b : one\nselect 2;\n" },
          { path: "users.sql", text: "--! a : one\nselect 1;\n" },
        ])
      } finally {
        yield* fs.remove(tmpDir, { recursive: true })
      }
    }).pipe(Effect.provide(TestLayer))
  )

  it.effect("fails with SourceReadError for a missing directory", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(readQuerySources("/nonexistent/pg-quill-queries"))
      expect(error._tag).toBe("SourceReadError")
      expect(error.path).toBe("/nonexistent/pg-quill-queries")
    }).pipe(Effect.provide(TestLayer))
  )
})
