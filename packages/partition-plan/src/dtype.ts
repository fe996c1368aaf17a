/**
 * @module dtype
 *
 * Element type tokens accepted for partitioned arrays.
 */

import { ValidationError } from "./errors.js";

/** Fixed-width numeric element types. */
export type DType =
  | "int8"
  | "int16"
  | "int32"
  | "uint8"
  | "uint16"
  | "uint32"
  | "float32"
  | "float64";

export const DTYPES: readonly DType[] = [
  "int8",
  "int16",
  "int32",
  "uint8",
  "uint16",
  "uint32",
  "float32",
  "float64",
];

const ITEM_SIZES: Record<DType, number> = {
  int8: 1,
  int16: 2,
  int32: 4,
  uint8: 1,
  uint16: 2,
  uint32: 4,
  float32: 4,
  float64: 8,
};

const VALUE_RANGES: Record<DType, readonly [min: number, max: number]> = {
  int8: [-128, 127],
  int16: [-32768, 32767],
  int32: [-2147483648, 2147483647],
  uint8: [0, 255],
  uint16: [0, 65535],
  uint32: [0, 4294967295],
  float32: [-3.4028234663852886e38, 3.4028234663852886e38],
  float64: [-Number.MAX_VALUE, Number.MAX_VALUE],
};

// Array-protocol codes, e.g. "<f8" from numpy-produced metadata
const TYPE_CODES = new Map<string, DType>([
  ["i1", "int8"],
  ["i2", "int16"],
  ["i4", "int32"],
  ["u1", "uint8"],
  ["u2", "uint16"],
  ["u4", "uint32"],
  ["f4", "float32"],
  ["f8", "float64"],
]);

export function isDType(value: unknown): value is DType {
  return typeof value === "string" && Object.hasOwn(ITEM_SIZES, value);
}

/**
 * Resolve a dtype token to its canonical name.
 *
 * Accepts canonical names (`float32`) and little-endian or byte-order-free
 * array-protocol codes (`f4`, `<f4`, `|u1`).
 */
export function parseDType(token: string): DType {
  const normalized = token.trim().toLowerCase();
  if (isDType(normalized)) {
    return normalized;
  }

  if (normalized.startsWith(">")) {
    throw new ValidationError(
      `Big-endian dtype "${token}" is not supported; elements are stored little-endian`,
    );
  }

  const code = normalized.replace(/^[<|=]/, "");
  const dtype = TYPE_CODES.get(code);
  if (dtype === undefined) {
    throw new ValidationError(
      `Unrecognized dtype "${token}". Options: ${DTYPES.join(", ")}`,
    );
  }
  return dtype;
}

/** Bytes per element. */
export function itemSize(dtype: DType): number {
  return ITEM_SIZES[dtype];
}

export function isIntegerDType(dtype: DType): boolean {
  return dtype !== "float32" && dtype !== "float64";
}

/** Smallest and largest finite value of `dtype`. */
export function valueRange(dtype: DType): readonly [min: number, max: number] {
  return VALUE_RANGES[dtype];
}

/** Whether `value` is stored as `dtype` without rounding or wrapping. */
export function isRepresentable(value: number, dtype: DType): boolean {
  const [min, max] = VALUE_RANGES[dtype];
  if (!Number.isFinite(value) || value < min || value > max) {
    return false;
  }
  return !isIntegerDType(dtype) || Number.isInteger(value);
}
