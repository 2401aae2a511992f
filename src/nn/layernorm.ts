/**
 * Layer Normalization module.
 * Similar to PyTorch's nn.LayerNorm.
 */

import { ones, Parameter, type Tensor, zeros } from "../frontend-tensor";
import { layerNorm } from "./functional";
import { Module } from "./module";

export type LayerNormOptions = {
  /** Small constant for numerical stability. Default: 1e-5 */
  eps?: number;
  /** Whether to include learnable affine parameters. Default: true */
  elementwiseAffine?: boolean;
};

/**
 * Applies Layer Normalization over the last dimension:
 *   y = (x - mean) / sqrt(var + eps) * weight + bias
 */
export class LayerNorm extends Module<[Tensor]> {
  readonly normalizedShape: number;
  readonly eps: number;
  readonly weight: Parameter | null;
  readonly bias: Parameter | null;

  constructor(normalizedShape: number, options?: LayerNormOptions) {
    super();
    this.normalizedShape = normalizedShape;
    this.eps = options?.eps ?? 1e-5;

    if (options?.elementwiseAffine ?? true) {
      // Initialize weight to ones and bias to zeros (like PyTorch)
      this.weight = this.registerParameter("weight", Parameter.from(ones([normalizedShape])));
      this.bias = this.registerParameter("bias", Parameter.from(zeros([normalizedShape])));
    } else {
      this.weight = null;
      this.bias = null;
    }
  }

  forward(input: Tensor): Tensor {
    return layerNorm(input, this.weight, this.bias, { eps: this.eps });
  }
}
