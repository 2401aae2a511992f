/**
 * Registry of live symbolic values.
 *
 * The runtime (tensor methods, nn.functional) only needs to know whether an
 * operand is symbolic and which tracer owns it, so this module stays free of
 * runtime imports and can be depended on from every layer.
 */

import type { Tensor } from "../frontend-tensor";
import type { Node } from "./node";

export type RecordedCallKind = "call_method" | "call_function";

/**
 * The slice of a tracer that symbolic values and runtime dispatch talk to.
 */
export interface SymbolicTracer {
  createNode(
    op: RecordedCallKind,
    target: string,
    args: readonly unknown[],
    kwargs?: Readonly<Record<string, unknown>>,
  ): Node;
  createProxy(
    op: RecordedCallKind,
    target: string,
    args: readonly unknown[],
    kwargs?: Readonly<Record<string, unknown>>,
  ): Tensor;
}

export interface SymbolicValue {
  readonly tracer: SymbolicTracer;
  /** Node this value stands for. Attributes create theirs on first use. */
  node(): Node;
}

/** Key under which a keyword bag refers back to its symbolic value. */
export const KEYWORD_BAG: unique symbol = Symbol("symtrace.keywordBag");

const registry = new WeakMap<object, SymbolicValue>();

export function bindSymbolic(handle: object, value: SymbolicValue): void {
  registry.set(handle, value);
}

export function symbolicValueOf(value: unknown): SymbolicValue | undefined {
  if ((typeof value === "object" && value !== null) || typeof value === "function") {
    return registry.get(value);
  }
  return undefined;
}

export function isSymbolic(value: unknown): boolean {
  return symbolicValueOf(value) !== undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * The symbolic value a keyword bag was copied from. `undefined` for anything
 * that is not a plain object carrying `KEYWORD_BAG`.
 */
export function keywordBagSource(value: unknown): SymbolicValue | undefined {
  if (!isPlainObject(value) || !Object.prototype.hasOwnProperty.call(value, KEYWORD_BAG)) {
    return undefined;
  }
  return symbolicValueOf(Reflect.get(value, KEYWORD_BAG));
}

/**
 * Find the tracer owning the first symbolic value among `values`, looking
 * into arrays and plain objects.
 */
export function findSymbolicTracer(values: readonly unknown[]): SymbolicTracer | undefined {
  for (const value of values) {
    const symbolic = symbolicValueOf(value) ?? keywordBagSource(value);
    if (symbolic) return symbolic.tracer;
    if (Array.isArray(value)) {
      const nested = findSymbolicTracer(value);
      if (nested) return nested;
    } else if (isPlainObject(value)) {
      const nested = findSymbolicTracer(Object.values(value));
      if (nested) return nested;
    }
  }
  return undefined;
}
