/**
 * Functional neural network operations.
 * Similar to PyTorch's torch.nn.functional.
 *
 * Each op records a `call_function` node named after the op when any operand
 * is symbolic, and computes eagerly otherwise. Options bags become the
 * node's kwargs. Graph interpretation resolves `call_function` targets by
 * export name in this module, so every op here is exported under the name it
 * records.
 */

import { normalizeLastDim, type ReduceOptions } from "../backend/cpu/numeric";
import type { Shape } from "../core/shape";
import { type Operand, Tensor } from "../frontend-tensor";
import { findSymbolicTracer } from "../fx/symbolic";

function dispatch(
  op: string,
  args: readonly unknown[],
  kwargs: Readonly<Record<string, unknown>> | undefined,
  eager: () => Tensor,
): Tensor {
  const tracer = findSymbolicTracer(kwargs ? [...args, kwargs] : args);
  if (tracer) {
    return tracer.createProxy("call_function", op, args, kwargs);
  }
  return eager();
}

function lift(value: Operand): Tensor {
  return typeof value === "number" ? new Tensor(Float32Array.of(value), []) : value;
}

export function add(a: Operand, b: Operand): Tensor {
  return dispatch("add", [a, b], undefined, () => lift(a).add(b));
}

export function sub(a: Operand, b: Operand): Tensor {
  return dispatch("sub", [a, b], undefined, () => lift(a).sub(b));
}

export function mul(a: Operand, b: Operand): Tensor {
  return dispatch("mul", [a, b], undefined, () => lift(a).mul(b));
}

export function div(a: Operand, b: Operand): Tensor {
  return dispatch("div", [a, b], undefined, () => lift(a).div(b));
}

export function neg(input: Tensor): Tensor {
  return dispatch("neg", [input], undefined, () => input.neg());
}

export function exp(input: Tensor): Tensor {
  return dispatch("exp", [input], undefined, () => input.exp());
}

export function tanh(input: Tensor): Tensor {
  return dispatch("tanh", [input], undefined, () => input.tanh());
}

export function relu(input: Tensor): Tensor {
  return dispatch("relu", [input], undefined, () => input.relu());
}

export function sigmoid(input: Tensor): Tensor {
  return dispatch("sigmoid", [input], undefined, () => input.sigmoid());
}

export function matmul(a: Tensor, b: Tensor): Tensor {
  return dispatch("matmul", [a, b], undefined, () => a.matmul(b));
}

/** Swap the last two dimensions. */
export function transpose(input: Tensor): Tensor {
  return dispatch("transpose", [input], undefined, () => input.transpose());
}

export function reshape(input: Tensor, shape: Shape): Tensor {
  return dispatch("reshape", [input, shape], undefined, () => input.reshape(shape));
}

export function sum(input: Tensor, options?: ReduceOptions): Tensor {
  return dispatch("sum", [input], options, () => input.sum(options));
}

export function mean(input: Tensor, options?: ReduceOptions): Tensor {
  return dispatch("mean", [input], options, () => input.mean(options));
}

/** Softmax over the last dimension. */
export function softmax(input: Tensor): Tensor {
  return dispatch("softmax", [input], undefined, () => input.softmax());
}

/**
 * Linear transformation: y = x @ W^T + b
 *
 * @param input - [..., inFeatures]
 * @param weight - [outFeatures, inFeatures]
 * @param bias - [outFeatures], or null
 */
export function linear(input: Tensor, weight: Tensor, bias: Tensor | null): Tensor {
  return dispatch("linear", [input, weight, bias], undefined, () => {
    const out = input.matmul(weight.transpose());
    return bias === null ? out : out.add(bias);
  });
}

export type LayerNormFunctionalOptions = {
  /** Added to the variance for numerical stability. Default: 1e-5 */
  eps?: number;
};

/**
 * Layer normalization over the last dimension, followed by an optional
 * elementwise affine transform.
 */
export function layerNorm(
  input: Tensor,
  weight: Tensor | null,
  bias: Tensor | null,
  options?: LayerNormFunctionalOptions,
): Tensor {
  return dispatch("layerNorm", [input, weight, bias], options, () => {
    const eps = options?.eps ?? 1e-5;
    let out = Tensor.fromNDArray(normalizeLastDim(input.storage(), eps));
    if (weight !== null) out = out.mul(weight);
    if (bias !== null) out = out.add(bias);
    return out;
  });
}

export type DropoutFunctionalOptions = {
  /** Probability of an element to be zeroed. Default: 0.5 */
  p?: number;
  /** Whether dropout is active. Default: true */
  training?: boolean;
};

/**
 * Apply dropout to a tensor.
 *
 * During training, zeroes elements with probability p and scales the
 * remaining elements by 1/(1-p). During evaluation returns the input
 * unchanged.
 */
export function dropout(input: Tensor, options?: DropoutFunctionalOptions): Tensor {
  return dispatch("dropout", [input], options, () => {
    const p = options?.p ?? 0.5;
    const training = options?.training ?? true;
    if (p < 0 || p > 1) {
      throw new Error(`dropout probability must be between 0 and 1, got ${p}`);
    }
    if (!training || p === 0) {
      return input;
    }
    if (p === 1) {
      return input.mul(0);
    }
    const mask = new Float32Array(input.size);
    for (let i = 0; i < mask.length; i += 1) {
      mask[i] = Math.random() < p ? 0 : 1 / (1 - p);
    }
    return input.mul(new Tensor(mask, input.shape));
  });
}
