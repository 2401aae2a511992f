import * as numeric from "./backend/cpu/numeric";
import type { NDArray, ReduceOptions } from "./backend/cpu/numeric";
import type { Shape } from "./core/shape";
import { findSymbolicTracer } from "./fx/symbolic";

export type TensorCreateOptions = {
  requiresGrad?: boolean;
};

export type Operand = Tensor | number;

function toNDArray(value: Operand): NDArray {
  return typeof value === "number" ? numeric.scalar(value) : value.storage();
}

/**
 * Eager CPU tensor.
 *
 * Every method checks its operands for symbolic values first: when one is
 * found the call is recorded as a `call_method` node on the owning tracer
 * instead of being computed, with this (concrete) tensor as the receiver.
 */
export class Tensor {
  readonly shape: Shape;
  readonly data: Float32Array;
  readonly requiresGrad: boolean;

  constructor(data: Float32Array, shape: Shape, options?: TensorCreateOptions) {
    const checked = numeric.ndarray(shape, data);
    this.shape = checked.shape;
    this.data = checked.data;
    this.requiresGrad = options?.requiresGrad ?? false;
  }

  static fromNDArray(array: NDArray): Tensor {
    return new Tensor(array.data, array.shape);
  }

  get size(): number {
    return this.data.length;
  }

  storage(): NDArray {
    return { shape: this.shape, data: this.data };
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  item(): number {
    if (this.data.length !== 1) {
      throw new Error(`item() requires a single-element tensor, got shape [${this.shape}]`);
    }
    return this.data[0];
  }

  private traced(method: string, args: readonly unknown[]): Tensor | undefined {
    const tracer = findSymbolicTracer(args);
    return tracer?.createProxy("call_method", method, [this, ...args]);
  }

  add(other: Operand): Tensor {
    return this.traced("add", [other])
      ?? Tensor.fromNDArray(numeric.add(this.storage(), toNDArray(other)));
  }

  sub(other: Operand): Tensor {
    return this.traced("sub", [other])
      ?? Tensor.fromNDArray(numeric.sub(this.storage(), toNDArray(other)));
  }

  mul(other: Operand): Tensor {
    return this.traced("mul", [other])
      ?? Tensor.fromNDArray(numeric.mul(this.storage(), toNDArray(other)));
  }

  div(other: Operand): Tensor {
    return this.traced("div", [other])
      ?? Tensor.fromNDArray(numeric.div(this.storage(), toNDArray(other)));
  }

  matmul(other: Tensor): Tensor {
    return this.traced("matmul", [other])
      ?? Tensor.fromNDArray(numeric.matmul(this.storage(), other.storage()));
  }

  neg(): Tensor {
    return Tensor.fromNDArray(numeric.neg(this.storage()));
  }

  exp(): Tensor {
    return Tensor.fromNDArray(numeric.exp(this.storage()));
  }

  tanh(): Tensor {
    return Tensor.fromNDArray(numeric.tanh(this.storage()));
  }

  relu(): Tensor {
    return Tensor.fromNDArray(numeric.relu(this.storage()));
  }

  sigmoid(): Tensor {
    return Tensor.fromNDArray(numeric.sigmoid(this.storage()));
  }

  softmax(): Tensor {
    return Tensor.fromNDArray(numeric.softmax(this.storage()));
  }

  /** Swap the last two dimensions. */
  transpose(): Tensor {
    return Tensor.fromNDArray(numeric.transpose(this.storage()));
  }

  reshape(shape: Shape): Tensor {
    return this.traced("reshape", [shape])
      ?? Tensor.fromNDArray(numeric.reshape(this.storage(), shape));
  }

  sum(options?: ReduceOptions): Tensor {
    return Tensor.fromNDArray(numeric.sum(this.storage(), options));
  }

  mean(options?: ReduceOptions): Tensor {
    return Tensor.fromNDArray(numeric.mean(this.storage(), options));
  }
}

/**
 * A tensor registered as a learnable parameter of a module.
 */
export class Parameter extends Tensor {
  constructor(data: Float32Array, shape: Shape) {
    super(data, shape, { requiresGrad: true });
  }

  static from(tensor: Tensor): Parameter {
    return new Parameter(tensor.data.slice(), tensor.shape);
  }
}

export function tensor(values: number[], shape?: Shape): Tensor {
  return new Tensor(Float32Array.from(values), shape ?? [values.length]);
}

export function full(shape: Shape, fillValue: number): Tensor {
  return Tensor.fromNDArray(numeric.full(shape, fillValue));
}

export function zeros(shape: Shape): Tensor {
  return full(shape, 0);
}

export function ones(shape: Shape): Tensor {
  return full(shape, 1);
}

/**
 * Standard normal samples (Box-Muller), optionally scaled.
 */
export function randn(shape: Shape, scale = 1): Tensor {
  const data = numeric.full(shape, 0).data;
  for (let i = 0; i < data.length; i += 2) {
    const u1 = Math.random();
    const u2 = Math.random();
    const r = Math.sqrt(-2 * Math.log(u1 || 1e-10));
    const theta = 2 * Math.PI * u2;
    data[i] = r * Math.cos(theta) * scale;
    if (i + 1 < data.length) {
      data[i + 1] = r * Math.sin(theta) * scale;
    }
  }
  return new Tensor(data, shape);
}
