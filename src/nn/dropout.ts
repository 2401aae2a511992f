/**
 * Dropout module.
 */

import type { Tensor } from "../frontend-tensor";
import { dropout } from "./functional";
import { Module } from "./module";

export type DropoutOptions = {
  /** Probability of an element to be zeroed (default: 0.5) */
  p?: number;
};

/**
 * During training, randomly zeroes elements with probability p and scales
 * the remaining elements by 1/(1-p). During evaluation, returns the input
 * unchanged.
 */
export class Dropout extends Module<[Tensor]> {
  readonly p: number;

  constructor(options?: DropoutOptions) {
    super();
    this.p = options?.p ?? 0.5;
    if (this.p < 0 || this.p > 1) {
      throw new Error(`Dropout probability must be between 0 and 1, got ${this.p}`);
    }
  }

  forward(input: Tensor): Tensor {
    return dropout(input, { p: this.p, training: this.training });
  }
}
