import type { Tensor } from "../frontend-tensor";
import { TraceError, UnrepresentableArgumentError } from "./errors";
import { Graph } from "./graph";
import { type Argument, Node, type NodeKind } from "./node";
import { createSymbolicProxy } from "./proxy";
import {
  isPlainObject,
  KEYWORD_BAG,
  keywordBagSource,
  type SymbolicTracer,
  symbolicValueOf,
} from "./symbolic";

// Set SYMTRACE_DEBUG_TRACE=1 to log every recorded node
export const DEBUG_TRACE = typeof process !== "undefined" && !!process.env?.SYMTRACE_DEBUG_TRACE;

function describeValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

/**
 * Graph construction shared by all tracers: node creation, symbolic value
 * creation, and normalization of plain values into graph arguments. Knows
 * nothing about modules; `Tracer` adds module, parameter and constant
 * handling on top.
 */
export class TracerBase implements SymbolicTracer {
  private activeGraph: Graph | null = null;

  /** The graph under construction. Throws outside a trace. */
  get graph(): Graph {
    if (this.activeGraph === null) {
      throw new TraceError("no trace in progress");
    }
    return this.activeGraph;
  }

  protected beginGraph(): Graph {
    this.activeGraph = new Graph();
    return this.activeGraph;
  }

  protected endGraph(): void {
    this.activeGraph = null;
  }

  createNode(
    op: NodeKind,
    target: string,
    args: readonly unknown[],
    kwargs: Readonly<Record<string, unknown>> = {},
    name?: string,
  ): Node {
    const normalizedArgs = args.map((arg) => this.createArg(arg));
    const normalizedKwargs: Record<string, Argument> = {};
    for (const [key, value] of Object.entries(kwargs)) {
      normalizedKwargs[key] = this.createArg(value);
    }
    return this.recordNode(this.graph.createNode(op, target, normalizedArgs, normalizedKwargs, name));
  }

  /** Hook for every node this tracer adds to its graph. */
  protected recordNode(node: Node): Node {
    if (DEBUG_TRACE) {
      console.log(`[trace] %${node.name} = ${node.op}[target=${node.target}]`);
    }
    return node;
  }

  createProxy(
    op: NodeKind,
    target: string,
    args: readonly unknown[],
    kwargs?: Readonly<Record<string, unknown>>,
  ): Tensor {
    return createSymbolicProxy(this, this.createNode(op, target, args, kwargs));
  }

  /**
   * Normalize `value` into a graph argument. Symbolic values and keyword
   * bags become their nodes; arrays and plain objects are normalized
   * element-wise; literals pass through. Anything else is rejected.
   */
  createArg(value: unknown): Argument {
    const bag = keywordBagSource(value);
    if (bag && isPlainObject(value)) {
      if (Reflect.ownKeys(value).length !== 1) {
        throw new TraceError(`keyword bag %${bag.node().name} cannot be merged with other entries`);
      }
      return this.createArg(Reflect.get(value, KEYWORD_BAG));
    }
    const symbolic = symbolicValueOf(value);
    if (symbolic) {
      if (symbolic.tracer !== this) {
        throw new TraceError("symbolic value belongs to a different trace");
      }
      return symbolic.node();
    }
    if (value instanceof Node) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.createArg(item));
    }
    if (isPlainObject(value)) {
      const out: { [key: string]: Argument } = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = this.createArg(item);
      }
      return out;
    }
    if (
      value === null
      || value === undefined
      || typeof value === "number"
      || typeof value === "string"
      || typeof value === "boolean"
    ) {
      return value;
    }
    throw new UnrepresentableArgumentError(
      `cannot represent a value of type ${describeValue(value)} as a graph argument`,
    );
  }
}
