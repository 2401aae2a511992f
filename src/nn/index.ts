/**
 * Neural network modules and functions.
 * Similar to PyTorch's torch.nn.
 */

export { Identity, ReLU, Tanh } from "./activation";
export { ModuleList, Sequential } from "./container";
export { Dropout, type DropoutOptions } from "./dropout";
// Functional interface (nn.functional)
export * as functional from "./functional";
export { type ModuleCallHook, currentModuleCallHook, withModuleCallHook } from "./hooks";
export { LayerNorm, type LayerNormOptions } from "./layernorm";
export { Linear, type LinearOptions } from "./linear";
export { type AnyModule, Module } from "./module";
export { isStandardModule, STANDARD_MODULES } from "./standard";
