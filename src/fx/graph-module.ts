import * as functional from "../nn/functional";
import { type AnyModule, Module } from "../nn/module";
import { GraphError } from "./errors";
import type { Graph } from "./graph";
import { type Argument, Node } from "./node";

/**
 * A traced graph paired with the module it was traced from. `run` evaluates
 * the graph node by node against the module's live state, so it sees the
 * same parameters and attached constants as the module itself.
 */
export class GraphModule {
  readonly root: AnyModule;
  readonly graph: Graph;

  constructor(root: AnyModule, graph: Graph) {
    this.root = root;
    this.graph = graph;
  }

  /**
   * Evaluate the graph. `inputs` bind to the placeholders in order.
   */
  run(...inputs: unknown[]): unknown {
    const env = new Map<Node, unknown>();
    const evaluate = (arg: Argument): unknown => {
      if (arg instanceof Node) {
        if (!env.has(arg)) {
          throw new GraphError(`%${arg.name} is used before it is computed`);
        }
        return env.get(arg);
      }
      if (Array.isArray(arg)) {
        return arg.map(evaluate);
      }
      if (typeof arg === "object" && arg !== null) {
        const out: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(arg)) {
          out[key] = evaluate(value);
        }
        return out;
      }
      return arg;
    };

    let placeholderIndex = 0;
    for (const node of this.graph.nodes) {
      const args = node.args.map(evaluate);
      const kwargs = Object.entries(node.kwargs);
      if (kwargs.length > 0) {
        args.push(Object.fromEntries(kwargs.map(([key, value]) => [key, evaluate(value)])));
      }
      switch (node.op) {
        case "placeholder": {
          if (placeholderIndex >= inputs.length) {
            throw new GraphError(`missing input for placeholder %${node.name}`);
          }
          env.set(node, inputs[placeholderIndex]);
          placeholderIndex += 1;
          break;
        }
        case "get_constant":
          env.set(node, this.resolve(node.target));
          break;
        case "call_module": {
          const module = this.resolve(node.target);
          if (!(module instanceof Module)) {
            throw new GraphError(`${node.target} is not a module`);
          }
          env.set(node, Reflect.apply(module.forward, module, args));
          break;
        }
        case "call_method": {
          const [receiver, ...rest] = args;
          const method: unknown = isObject(receiver) ? Reflect.get(receiver, node.target) : undefined;
          if (typeof method !== "function") {
            throw new GraphError(`%${node.name}: receiver has no method ${node.target}`);
          }
          env.set(node, Reflect.apply(method, receiver, rest));
          break;
        }
        case "call_function":
          env.set(node, callFunction(node, args));
          break;
        case "output":
          return args[0];
      }
    }
    throw new GraphError("graph has no output node");
  }

  toString(): string {
    return this.graph.toString();
  }

  private resolve(path: string): unknown {
    let current: unknown = this.root;
    for (const segment of path.split(".")) {
      if (typeof current !== "object" || current === null || !(segment in current)) {
        throw new GraphError(`${path} does not resolve on the root module`);
      }
      current = Reflect.get(current, segment);
    }
    return current;
  }
}

function isObject(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function callFunction(node: Node, args: unknown[]): unknown {
  if (node.target === "getattr") {
    const [owner, name] = args;
    if (!isObject(owner) || typeof name !== "string") {
      throw new GraphError(`%${node.name}: getattr needs an object and a name`);
    }
    return Reflect.get(owner, name);
  }
  const fn: unknown = Reflect.get(functional, node.target);
  if (typeof fn !== "function") {
    throw new GraphError(`%${node.name}: unknown function ${node.target}`);
  }
  return Reflect.apply(fn, undefined, args);
}
