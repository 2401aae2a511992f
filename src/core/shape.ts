/**
 * Shape arithmetic shared by the CPU kernels and the tensor frontend.
 */

export type Shape = number[];

export function sizeOf(shape: Shape): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function broadcastShapes(a: Shape, b: Shape): Shape {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new Error(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = Math.max(aDim, bDim);
  }
  return out;
}

/** Row-major strides for a contiguous tensor of the given shape. */
export function computeStrides(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i -= 1) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/** Resolve a possibly-negative dimension index against a rank. */
export function normalizeDim(dim: number, rank: number): number {
  const resolved = dim < 0 ? dim + rank : dim;
  if (resolved < 0 || resolved >= rank) {
    throw new Error(`Dimension ${dim} out of range for rank ${rank}`);
  }
  return resolved;
}

export function matmulShape(a: Shape, b: Shape): Shape {
  if (a.length < 2 || b.length !== 2) {
    throw new Error(`matmul expects [..., m, k] @ [k, n], got [${a}] @ [${b}]`);
  }
  const k = a[a.length - 1];
  if (k !== b[0]) {
    throw new Error(`matmul inner dimensions differ: [${a}] @ [${b}]`);
  }
  return [...a.slice(0, -1), b[1]];
}

/**
 * Resolve a reshape target, filling in a single `-1` dimension.
 */
export function inferReshape(size: number, shape: Shape): Shape {
  const inferred = shape.indexOf(-1);
  if (inferred !== shape.lastIndexOf(-1)) {
    throw new Error("reshape accepts at most one -1 dimension");
  }
  if (inferred === -1) {
    if (sizeOf(shape) !== size) {
      throw new Error(`Cannot reshape ${size} elements to [${shape}]`);
    }
    return shape.slice();
  }
  const known = shape.reduce((acc, dim, i) => (i === inferred ? acc : acc * dim), 1);
  if (known === 0 || size % known !== 0) {
    throw new Error(`Cannot reshape ${size} elements to [${shape}]`);
  }
  const out = shape.slice();
  out[inferred] = size / known;
  return out;
}
