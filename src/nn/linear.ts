/**
 * Linear (fully connected) layer.
 * Similar to PyTorch's nn.Linear.
 */

import { Parameter, randn, type Tensor, zeros } from "../frontend-tensor";
import { linear } from "./functional";
import { Module } from "./module";

export type LinearOptions = {
  /** Whether to include a bias term. Default: true */
  bias?: boolean;
};

/**
 * Linear transformation: y = x @ W^T + b
 *
 * @example
 * ```ts
 * const fc = new Linear(768, 3072);  // [batch, 768] -> [batch, 3072]
 * const output = fc.call(input);
 * ```
 */
export class Linear extends Module<[Tensor]> {
  readonly inFeatures: number;
  readonly outFeatures: number;
  readonly weight: Parameter;
  readonly bias: Parameter | null;

  constructor(inFeatures: number, outFeatures: number, options?: LinearOptions) {
    super();
    this.inFeatures = inFeatures;
    this.outFeatures = outFeatures;

    // Scale by 1/sqrt(in_features) for better gradient flow
    const scale = 1 / Math.sqrt(inFeatures);
    // Weight shape: [outFeatures, inFeatures]
    this.weight = this.registerParameter(
      "weight",
      Parameter.from(randn([outFeatures, inFeatures], scale)),
    );
    this.bias = (options?.bias ?? true)
      ? this.registerParameter("bias", Parameter.from(zeros([outFeatures])))
      : null;
  }

  /**
   * @param input - Input tensor of shape [..., inFeatures]
   * @returns Output tensor of shape [..., outFeatures]
   */
  forward(input: Tensor): Tensor {
    return linear(input, this.weight, this.bias);
  }
}
