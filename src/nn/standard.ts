import { Identity, ReLU, Tanh } from "./activation";
import { ModuleList, Sequential } from "./container";
import { Dropout } from "./dropout";
import { LayerNorm } from "./layernorm";
import { Linear } from "./linear";
import type { AnyModule } from "./module";

/**
 * Constructors that make up the standard module library. Membership is by
 * exact constructor: a user subclass of `Linear` is not a standard module.
 */
export const STANDARD_MODULES: ReadonlySet<unknown> = new Set<unknown>([
  Linear,
  LayerNorm,
  Dropout,
  ReLU,
  Tanh,
  Identity,
  Sequential,
  ModuleList,
]);

export function isStandardModule(module: AnyModule): boolean {
  return STANDARD_MODULES.has(module.constructor);
}
