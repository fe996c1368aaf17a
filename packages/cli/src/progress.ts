import type { PartitionOutcome, ProgressObserver } from "@framesplit/zarr-vds";

/** Narrates partition progress one line at a time. */
export function consoleObserver(log: (line: string) => void): ProgressObserver {
  return {
    partitionMapped(partition, total) {
      log(
        `Mapped ${partition.index + 1}/${total}: ${partition.name} [${partition.start}, ${partition.end})`,
      );
    },
    partitionStarted(partition, total) {
      log(
        `Creating ${partition.index + 1}/${total}: ${partition.name} (${partition.frameCount} frames)`,
      );
    },
    partitionFinished(partition, outcome) {
      log(`  ${partition.name}: ${describeOutcome(outcome)}`);
    },
  };
}

export function describeOutcome(outcome: PartitionOutcome): string {
  return outcome.status === "created"
    ? "created"
    : `${outcome.status} (${outcome.reason})`;
}
