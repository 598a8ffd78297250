#!/usr/bin/env node
/**
 * pg-quill CLI
 *
 * Command-line interface for generating typed accessors from annotated
 * `.sql` files.
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (query names, file paths)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Option } from "effect";
import { runGenerate, type GenerateError, type GenerateResult } from "./generate.js";
import { formatDiagnostics } from "./services/diagnostics.js";
import packageJson from "../package.json" with { type: "json" };

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const queriesDir = Options.directory("queries").pipe(
  Options.withAlias("q"),
  Options.withDescription("Override queries directory"),
  Options.optional,
);

const outputDir = Options.directory("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Override output directory"),
  Options.optional,
);

const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Show what would be generated without writing files"),
  Options.withDefault(false),
);

// ============================================================================
// Generate Command Logic
// ============================================================================

interface GenerateArgs {
  readonly configPath: Option.Option<string>;
  readonly queriesDir: Option.Option<string>;
  readonly outputDir: Option.Option<string>;
  readonly dryRun: boolean;
}

/** Print an error the way the user should see it, then keep failing */
const report = (error: GenerateError) => {
  switch (error._tag) {
    case "GenerationFailed":
      return Console.error(`\n${formatDiagnostics(error.diagnostics, error.sources)}`);
    case "ConfigInvalid":
      return Console.error(`\n✗ Error: ${error._tag}`).pipe(
        Effect.andThen(Console.error(`  ${error.message}`)),
        Effect.andThen(Effect.forEach(error.errors, e => Console.error(`    - ${e}`))),
      );
    case "ConfigNotFound":
      return Console.error(`\n✗ Error: ${error._tag}`).pipe(
        Effect.andThen(Console.error(`  ${error.message}`)),
        Effect.andThen(Console.error(`  Searched: ${error.searchPaths.join(", ")}`)),
      );
    case "CatalogConsistencyError":
      return Console.error(`\n✗ Error: ${error._tag}`).pipe(
        Effect.andThen(Console.error(`  ${error.message}`)),
        Effect.andThen(Console.error(`  Path: ${error.path.join(" → ")}`)),
      );
    default:
      return Console.error(`\n✗ Error: ${error._tag}`).pipe(Effect.andThen(Console.error(`  ${error.message}`)));
  }
};

const runGenerateCommand = (args: GenerateArgs) => {
  const logSuccess = (result: GenerateResult) => {
    const written = result.writeResults.filter(r => r.written).length;
    const suffix = args.dryRun ? " (dry run)" : "";
    return Console.log(`\n✓ Generated ${result.files.length} files, ${written} changed${suffix}`);
  };

  return runGenerate({
    configPath: Option.getOrUndefined(args.configPath),
    queriesDir: Option.getOrUndefined(args.queriesDir),
    outputDir: Option.getOrUndefined(args.outputDir),
    dryRun: args.dryRun,
  }).pipe(
    Effect.tap(logSuccess),
    Effect.tapError(report),
    Effect.asVoid,
  );
};

// ============================================================================
// Commands
// ============================================================================

const options = { configPath, queriesDir, outputDir, dryRun };

const generateCommand = Command.make("generate", options, runGenerateCommand);

// Root command runs generate by default
const rootCommand = Command.make("pgquill", options, runGenerateCommand).pipe(
  Command.withSubcommands([generateCommand]),
);

// ============================================================================
// CLI App
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "pgquill",
  version: packageJson.version,
});

// Run with Node.js platform; a failure sets a non-zero exit code
cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
