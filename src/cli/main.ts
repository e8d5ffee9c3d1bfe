#!/usr/bin/env tsx
import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Option, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runPlan, runCopy, withErrorHandling, AppLive } from "@cli/handler";

const planCommand = Command.make(
  "plan",
  {
    src: Opts.src,
    maxFiles: Opts.maxFiles,
    maxBytes: Opts.maxBytes,
    seed: Opts.seed,
    extensions: Opts.extensions,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(
      runPlan({
        src: opts.src,
        maxFiles: opts.maxFiles,
        maxBytes: opts.maxBytes,
        seed: Option.getOrUndefined(opts.seed),
        extensions: opts.extensions,
        debug: opts.debug
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Shuffle the source photos and show the folder layout, without copying"));

const copyCommand = Command.make(
  "copy",
  {
    src: Opts.src,
    dst: Opts.dst,
    maxFiles: Opts.maxFiles,
    maxBytes: Opts.maxBytes,
    seed: Opts.seed,
    extensions: Opts.extensions,
    concurrency: Opts.concurrency,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(
      runCopy({
        src: opts.src,
        dst: opts.dst,
        maxFiles: opts.maxFiles,
        maxBytes: opts.maxBytes,
        seed: Option.getOrUndefined(opts.seed),
        extensions: opts.extensions,
        concurrency: opts.concurrency,
        debug: opts.debug
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Copy the source photos into numbered folders 1..N under --dst"));

const rootCommand = Command.make("image-rando", {}).pipe(
  Command.withSubcommands([planCommand, copyCommand]),
  Command.withDescription(
    "Copy photos into numbered folders in random order, capped by photo count and size per folder"
  )
);

const cli = Command.run(rootCommand, {
  name: "image-rando",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
