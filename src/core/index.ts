import { Effect, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export type { FileEntry } from "./domain/FileEntry";
export type { Bin, DistributionPlan, Distribution, PlanSummary } from "./domain/DistributionPlan";
export type { DistributeConfig, PackingLimits } from "./domain/DistributeConfig";
export {
  DEFAULT_EXTENSIONS,
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_COUNT,
  InvalidConfig
} from "./domain/DistributeConfig";
export { distribute, packBins, permuteEntries } from "./services/Distributor";
export type { DistributeOptions } from "./services/Distributor";

export { SourceUnreadable, EmptySource } from "./services/InventoryService";
export type { InventoryError } from "./services/InventoryService";
export { DestinationNotEmpty, DestinationUnwritable } from "./services/DestinationService";
export type { DestinationError } from "./services/DestinationService";
export {
  CopySourceNotFound,
  CopyPermissionDenied,
  CopyDestinationExists,
  CopyDiskFull,
  CopyFailed
} from "./services/FileCopyService";
export type { MaterializeReport, MaterializeOptions } from "./services/MaterializerService";

import type { DistributeConfig } from "./domain/DistributeConfig";
import type { Distribution } from "./domain/DistributionPlan";
import { totalSize } from "./domain/FileEntry";
import { distribute } from "./services/Distributor";
import { InventoryServiceTag, InventoryServiceLive } from "./services/InventoryService";
import { DestinationServiceTag, DestinationServiceLive } from "./services/DestinationService";
import {
  MaterializerServiceTag,
  MaterializerServiceLive,
  type MaterializeOptions
} from "./services/MaterializerService";
import { LoggerServiceLive } from "./services/LoggerService";
import { DirectoryServiceLive, type DirectoryServiceTag } from "./services/DirectoryService";
import { FileStatServiceLive, type FileStatServiceTag } from "./services/FileStatService";
import { FileCopyServiceLive, type FileCopyServiceTag } from "./services/FileCopyService";

export interface DistributionResult extends Distribution {
  readonly inventory: {
    readonly fileCount: number;
    readonly totalBytes: number;
  };
}

/**
 * Inventory the source directory and pack it into a plan. Performs no writes.
 */
export const createDistribution = (sourcePath: string, config: DistributeConfig) =>
  Effect.gen(function* () {
    const inventory = yield* InventoryServiceTag;

    const entries = yield* inventory.build(sourcePath, { extensions: config.extensions });
    const distribution = yield* distribute(entries, {
      seed: config.seed,
      maxCount: config.maxCount,
      maxBytes: config.maxBytes
    });

    return {
      ...distribution,
      inventory: {
        fileCount: entries.length,
        totalBytes: totalSize(entries)
      }
    } satisfies DistributionResult;
  });

export const prepareDestination = (destinationRoot: string) =>
  Effect.flatMap(DestinationServiceTag, (destination) => destination.prepare(destinationRoot));

export const materializeDistribution = (
  distribution: Distribution,
  destinationRoot: string,
  options?: MaterializeOptions
) =>
  Effect.flatMap(MaterializerServiceTag, (materializer) =>
    materializer.materialize(distribution.plan, destinationRoot, options)
  );

export type InfraServices = DirectoryServiceTag | FileStatServiceTag | FileCopyServiceTag;

export const InfraLive: Layer.Layer<InfraServices> = pipe(
  Layer.mergeAll(DirectoryServiceLive, FileStatServiceLive, FileCopyServiceLive),
  Layer.provide(NodeContext.layer)
);

/**
 * Domain services on top of the given infra; tests pass a virtual filesystem here.
 */
export const createAppLayer = <E>(infra: Layer.Layer<InfraServices, E>) =>
  pipe(
    Layer.mergeAll(InventoryServiceLive, DestinationServiceLive, MaterializerServiceLive),
    Layer.provide(infra),
    Layer.merge(LoggerServiceLive)
  );

export const AppLive = createAppLayer(InfraLive);
