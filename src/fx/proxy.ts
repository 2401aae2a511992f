/**
 * Symbolic values.
 *
 * A symbolic value is a JS Proxy over a stand-in `Tensor`, so it type-checks
 * and passes `instanceof Tensor` wherever model code expects a tensor. Every
 * string-keyed property read yields a symbolic attribute:
 *
 * - invoking it (`x.add(y)`) records `call_method add(x, y)`;
 * - using it as a value (`F.reshape(x, x.shape)`) records
 *   `call_function getattr(x, "shape")` the first time it is needed.
 *
 * Symbolic values cannot be coerced to primitives or iterated, since either
 * would bake one concrete outcome into the graph.
 *
 * Object rest over a symbolic value (a `{ ...kw }` keywords parameter) yields
 * a keyword bag `{ [KEYWORD_BAG]: value }` that normalizes back to the value.
 */

import { Tensor } from "../frontend-tensor";
import { TraceError } from "./errors";
import type { Node } from "./node";
import { bindSymbolic, KEYWORD_BAG, type SymbolicTracer, type SymbolicValue } from "./symbolic";

function coercionError(node: () => Node): TraceError {
  return new TraceError(
    `symbolic value %${node().name} cannot be converted to a primitive; ` +
      "traced code cannot branch on or do arithmetic with symbolic values outside tensor ops",
  );
}

/**
 * `self` returns the proxy the handler is installed on. It is exposed as the
 * one own enumerable property, under `KEYWORD_BAG`, so that object rest
 * (`{ ...kw } = value`) copies a reference back to the symbolic value.
 */
function symbolicHandler<T extends object>(value: SymbolicValue, self: () => object): ProxyHandler<T> {
  return {
    get(_target, key) {
      if (typeof key === "symbol") {
        if (key === KEYWORD_BAG) {
          return self();
        }
        if (key === Symbol.toPrimitive) {
          return () => {
            throw coercionError(() => value.node());
          };
        }
        if (key === Symbol.iterator) {
          throw new TraceError(`symbolic value %${value.node().name} cannot be iterated`);
        }
        return undefined;
      }
      // Not a thenable: awaiting a symbolic value must not call into it.
      if (key === "then") {
        return undefined;
      }
      return createAttribute(value, key);
    },
    set(_target, key) {
      throw new TraceError(`cannot assign ${String(key)} on symbolic value %${value.node().name}`);
    },
    defineProperty(_target, key) {
      throw new TraceError(`cannot define ${String(key)} on symbolic value %${value.node().name}`);
    },
    ownKeys() {
      return [KEYWORD_BAG];
    },
    getOwnPropertyDescriptor(_target, key) {
      if (key !== KEYWORD_BAG) {
        return undefined;
      }
      return { value: self(), writable: false, enumerable: true, configurable: true };
    },
  };
}

function createAttribute(owner: SymbolicValue, name: string): unknown {
  let node: Node | undefined;
  const attribute: SymbolicValue = {
    tracer: owner.tracer,
    node: () => {
      node ??= owner.tracer.createNode("call_function", "getattr", [owner.node(), name]);
      return node;
    },
  };
  const handle: () => undefined = new Proxy(() => undefined, {
    ...symbolicHandler<() => undefined>(attribute, () => handle),
    apply(_target, _thisArg, args: unknown[]) {
      return owner.tracer.createProxy("call_method", name, [owner.node(), ...args]);
    },
  });
  bindSymbolic(handle, attribute);
  return handle;
}

/**
 * Wrap `node` in a fresh symbolic tensor owned by `tracer`.
 */
export function createSymbolicProxy(tracer: SymbolicTracer, node: Node): Tensor {
  const value: SymbolicValue = { tracer, node: () => node };
  const standIn = new Tensor(new Float32Array(0), [0]);
  const handle: Tensor = new Proxy(standIn, symbolicHandler<Tensor>(value, () => handle));
  bindSymbolic(handle, value);
  return handle;
}
