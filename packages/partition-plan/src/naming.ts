/**
 * @module naming
 *
 * Partition identifiers generated from brace format patterns such as
 * `run_{:03d}.zarr`.
 */

import { ValidationError } from "./errors.js";

/**
 * Produces the identifier of the partition at `index`.
 *
 * Functions built by {@link patternNaming} carry the pattern they format so a
 * plan can record it.
 */
export type NamingFn = ((index: number) => string) & {
  readonly pattern?: string;
};

const PLACEHOLDER = /\{(:[^}]*)?\}/g;
const INTEGER_SPEC = /^:(0)?(\d+)?d?$/;

/** Extension appended when a pattern has no placeholder. */
export const CONTAINER_EXTENSION = ".zarr";

/** Whether a pattern has an index placeholder (`{}` or `{:...}`). */
export function hasPlaceholder(pattern: string): boolean {
  return pattern.includes("{}") || pattern.includes("{:");
}

/**
 * Format the identifier for one partition.
 *
 * Supported placeholders: `{}`, `{:d}`, `{:3d}` (space padded) and `{:03d}`
 * (zero padded). A pattern without a placeholder gets `_<index:03d>.zarr`
 * appended.
 */
export function formatPartitionName(pattern: string, index: number): string {
  if (!hasPlaceholder(pattern)) {
    return `${pattern}_${String(index).padStart(3, "0")}${CONTAINER_EXTENSION}`;
  }

  return pattern.replace(PLACEHOLDER, (_match, spec: string | undefined) => {
    if (spec === undefined) {
      return String(index);
    }
    const parsed = INTEGER_SPEC.exec(spec);
    if (parsed === null) {
      throw new ValidationError(
        `Unsupported placeholder "{${spec}}" in naming pattern "${pattern}"`,
      );
    }
    const [, zero, width] = parsed;
    const digits = String(index);
    if (width === undefined) {
      return digits;
    }
    return digits.padStart(Number(width), zero === "0" ? "0" : " ");
  });
}

/** Build a naming function from a format pattern. */
export function patternNaming(pattern: string): NamingFn {
  if (pattern.length === 0) {
    throw new ValidationError("Naming pattern must not be empty");
  }
  // Surface bad placeholders before any partition is planned
  formatPartitionName(pattern, 0);
  return Object.assign((index: number) => formatPartitionName(pattern, index), {
    pattern,
  });
}

/**
 * Default pattern for the sources of a logical container:
 * `<stem>_source_{:03d}.zarr`.
 */
export function defaultNamingPattern(containerPath: string): string {
  const fileName = containerPath.replace(/[\\/]+$/, "").split(/[\\/]/).pop();
  const stem = (fileName ?? "").replace(/\.[^.]*$/, "") || "vds";
  return `${stem}_source_{:03d}${CONTAINER_EXTENSION}`;
}
