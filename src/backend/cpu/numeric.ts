import {
  broadcastShapes,
  computeStrides,
  inferReshape,
  matmulShape,
  normalizeDim,
  type Shape,
  sizeOf,
} from "../../core/shape";

/**
 * Contiguous row-major storage. All kernels allocate fresh output buffers and
 * never write to their inputs.
 */
export type NDArray = {
  readonly shape: Shape;
  readonly data: Float32Array;
};

export function ndarray(shape: Shape, data: Float32Array): NDArray {
  if (sizeOf(shape) !== data.length) {
    throw new Error("Tensor data length does not match shape");
  }
  return { shape: shape.slice(), data };
}

export function scalar(value: number): NDArray {
  return { shape: [], data: Float32Array.of(value) };
}

export function full(shape: Shape, fillValue: number): NDArray {
  const data = new Float32Array(sizeOf(shape));
  data.fill(fillValue);
  return { shape: shape.slice(), data };
}

/**
 * Read element `linear` of the broadcast output from an input whose shape is
 * right-aligned against `outShape`.
 */
function broadcastIndex(
  input: NDArray,
  inputStrides: number[],
  outShape: Shape,
  outStrides: number[],
  linear: number,
): number {
  const offset = outShape.length - input.shape.length;
  let index = 0;
  for (let d = 0; d < input.shape.length; d += 1) {
    const coord = Math.floor(linear / outStrides[d + offset]) % outShape[d + offset];
    if (input.shape[d] !== 1) {
      index += coord * inputStrides[d];
    }
  }
  return index;
}

function binary(a: NDArray, b: NDArray, fn: (x: number, y: number) => number): NDArray {
  const outShape = broadcastShapes(a.shape, b.shape);
  const outStrides = computeStrides(outShape);
  const aStrides = computeStrides(a.shape);
  const bStrides = computeStrides(b.shape);
  const out = new Float32Array(sizeOf(outShape));
  for (let i = 0; i < out.length; i += 1) {
    out[i] = fn(
      a.data[broadcastIndex(a, aStrides, outShape, outStrides, i)],
      b.data[broadcastIndex(b, bStrides, outShape, outStrides, i)],
    );
  }
  return { shape: outShape, data: out };
}

function unary(a: NDArray, fn: (x: number) => number): NDArray {
  return { shape: a.shape.slice(), data: a.data.map(fn) };
}

export function add(a: NDArray, b: NDArray): NDArray {
  return binary(a, b, (x, y) => x + y);
}

export function sub(a: NDArray, b: NDArray): NDArray {
  return binary(a, b, (x, y) => x - y);
}

export function mul(a: NDArray, b: NDArray): NDArray {
  return binary(a, b, (x, y) => x * y);
}

export function div(a: NDArray, b: NDArray): NDArray {
  return binary(a, b, (x, y) => x / y);
}

export function neg(a: NDArray): NDArray {
  return unary(a, (x) => -x);
}

export function exp(a: NDArray): NDArray {
  return unary(a, Math.exp);
}

export function tanh(a: NDArray): NDArray {
  return unary(a, Math.tanh);
}

export function relu(a: NDArray): NDArray {
  return unary(a, (x) => (x > 0 ? x : 0));
}

export function sigmoid(a: NDArray): NDArray {
  return unary(a, (x) => 1 / (1 + Math.exp(-x)));
}

export function reshape(a: NDArray, shape: Shape): NDArray {
  return { shape: inferReshape(a.data.length, shape), data: a.data };
}

/** Swap the last two dimensions. */
export function transpose(a: NDArray): NDArray {
  const rank = a.shape.length;
  if (rank < 2) {
    throw new Error("transpose requires at least 2 dimensions");
  }
  const rows = a.shape[rank - 2];
  const cols = a.shape[rank - 1];
  const batch = a.data.length / (rows * cols);
  const out = new Float32Array(a.data.length);
  for (let b = 0; b < batch; b += 1) {
    const base = b * rows * cols;
    for (let r = 0; r < rows; r += 1) {
      for (let c = 0; c < cols; c += 1) {
        out[base + c * rows + r] = a.data[base + r * cols + c];
      }
    }
  }
  const shape = a.shape.slice();
  shape[rank - 2] = cols;
  shape[rank - 1] = rows;
  return { shape, data: out };
}

/** [..., m, k] @ [k, n] -> [..., m, n] */
export function matmul(a: NDArray, b: NDArray): NDArray {
  const outShape = matmulShape(a.shape, b.shape);
  const k = b.shape[0];
  const n = b.shape[1];
  const rows = a.data.length / k;
  const out = new Float32Array(rows * n);
  for (let r = 0; r < rows; r += 1) {
    for (let c = 0; c < n; c += 1) {
      let acc = 0;
      for (let i = 0; i < k; i += 1) {
        acc += a.data[r * k + i] * b.data[i * n + c];
      }
      out[r * n + c] = acc;
    }
  }
  return { shape: outShape, data: out };
}

export type ReduceOptions = {
  dim?: number;
  keepdim?: boolean;
};

export function sum(a: NDArray, options?: ReduceOptions): NDArray {
  if (options?.dim === undefined) {
    const total = a.data.reduce((acc, x) => acc + x, 0);
    return options?.keepdim ? full(a.shape.map(() => 1), total) : scalar(total);
  }
  const dim = normalizeDim(options.dim, a.shape.length);
  const outer = sizeOf(a.shape.slice(0, dim));
  const size = a.shape[dim];
  const inner = sizeOf(a.shape.slice(dim + 1));
  const out = new Float32Array(outer * inner);
  for (let o = 0; o < outer; o += 1) {
    for (let s = 0; s < size; s += 1) {
      for (let i = 0; i < inner; i += 1) {
        out[o * inner + i] += a.data[(o * size + s) * inner + i];
      }
    }
  }
  const shape = a.shape.slice();
  if (options.keepdim) {
    shape[dim] = 1;
  } else {
    shape.splice(dim, 1);
  }
  return { shape, data: out };
}

export function mean(a: NDArray, options?: ReduceOptions): NDArray {
  const count = options?.dim === undefined
    ? a.data.length
    : a.shape[normalizeDim(options.dim, a.shape.length)];
  const total = sum(a, options);
  return unary(total, (x) => x / count);
}

function mapRows(a: NDArray, fn: (row: Float32Array) => Float32Array): NDArray {
  if (a.shape.length === 0) {
    throw new Error("row-wise ops require at least 1 dimension");
  }
  const width = a.shape[a.shape.length - 1];
  const out = new Float32Array(a.data.length);
  for (let start = 0; start < a.data.length; start += width) {
    out.set(fn(a.data.subarray(start, start + width)), start);
  }
  return { shape: a.shape.slice(), data: out };
}

/** Softmax over the last dimension. */
export function softmax(a: NDArray): NDArray {
  return mapRows(a, (row) => {
    const max = row.reduce((m, x) => Math.max(m, x), -Infinity);
    const shifted = row.map((x) => Math.exp(x - max));
    const total = shifted.reduce((acc, x) => acc + x, 0);
    return shifted.map((x) => x / total);
  });
}

/** Normalize over the last dimension (no affine transform). */
export function normalizeLastDim(a: NDArray, eps: number): NDArray {
  return mapRows(a, (row) => {
    const mu = row.reduce((acc, x) => acc + x, 0) / row.length;
    const variance = row.reduce((acc, x) => acc + (x - mu) * (x - mu), 0) / row.length;
    const inv = 1 / Math.sqrt(variance + eps);
    return row.map((x) => (x - mu) * inv);
  });
}
