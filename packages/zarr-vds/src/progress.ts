import type { Partition } from "@framesplit/partition-plan";

/** What happened to one partition during materialization. */
export type PartitionOutcome =
  | { status: "created" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

/**
 * Hooks called at partition granularity. Every hook is optional; library
 * code never prints progress itself.
 */
export interface ProgressObserver {
  /** A partition's range was added to a virtual layout. */
  partitionMapped?(partition: Partition, total: number): void;
  /** Materialization of a partition's target is about to begin. */
  partitionStarted?(partition: Partition, total: number): void;
  partitionFinished?(
    partition: Partition,
    outcome: PartitionOutcome,
    total: number,
  ): void;
}
