import type { DType } from "@framesplit/partition-plan";

/** Typed arrays backing the supported element types. */
export type NumericArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | Float32Array
  | Float64Array;

/** C-ordered block of frames. */
export type ArraySlab = {
  data: NumericArray;
  /** Leading dimension is the frame count. */
  shape: number[];
};

/** Allocate a zeroed typed array for `dtype`. */
export function allocate(dtype: DType, length: number): NumericArray {
  switch (dtype) {
    case "int8":
      return new Int8Array(length);
    case "int16":
      return new Int16Array(length);
    case "int32":
      return new Int32Array(length);
    case "uint8":
      return new Uint8Array(length);
    case "uint16":
      return new Uint16Array(length);
    case "uint32":
      return new Uint32Array(length);
    case "float32":
      return new Float32Array(length);
    case "float64":
      return new Float64Array(length);
  }
}

export function isNumericArray(value: unknown): value is NumericArray {
  return (
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Uint8Array ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

/** Row-major strides for `shape`, in elements. */
export function cStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i] ?? 1;
  }
  return strides;
}

/** Join slabs along the leading axis. */
export function concatSlabs(
  dtype: DType,
  frameShape: readonly number[],
  slabs: readonly ArraySlab[],
): ArraySlab {
  if (slabs.length === 1 && slabs[0] !== undefined) {
    return slabs[0];
  }

  const frames = slabs.reduce((sum, slab) => sum + (slab.shape[0] ?? 0), 0);
  const total = slabs.reduce((sum, slab) => sum + slab.data.length, 0);
  const data = allocate(dtype, total);
  let offset = 0;
  for (const slab of slabs) {
    data.set(slab.data, offset);
    offset += slab.data.length;
  }
  return { data, shape: [frames, ...frameShape] };
}

/** Slice frames `[start, end)` out of a slab. */
export function sliceFrames(
  slab: ArraySlab,
  start: number,
  end: number,
): ArraySlab {
  const frameShape = slab.shape.slice(1);
  const stride = frameShape.reduce((product, dim) => product * dim, 1);
  return {
    data: slab.data.subarray(start * stride, end * stride),
    shape: [end - start, ...frameShape],
  };
}

/**
 * Offset of the first element where two arrays differ, -1 when they are
 * identical. Arrays of different length differ at the shorter length.
 */
export function firstDifference(a: NumericArray, b: NumericArray): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return i;
  }
  return a.length === b.length ? -1 : length;
}
