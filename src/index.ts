export {
  full,
  ones,
  type Operand,
  Parameter,
  randn,
  Tensor,
  type TensorCreateOptions,
  tensor,
  zeros,
} from "./frontend-tensor";
export type { Shape } from "./core/shape";
export * from "./fx";
export * as nn from "./nn";
