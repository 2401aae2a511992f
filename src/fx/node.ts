import type { Graph } from "./graph";

export type NodeKind =
  | "placeholder"
  | "get_constant"
  | "call_module"
  | "call_method"
  | "call_function"
  | "output";

export type ArgumentLiteral = number | string | boolean | null | undefined;

/**
 * Values that may appear in a node's args/kwargs: references to other nodes,
 * literals, and ordered or keyed containers of those. Never a live object.
 */
export type Argument =
  | Node
  | ArgumentLiteral
  | Argument[]
  | { [key: string]: Argument };

export class Node {
  readonly graph: Graph;
  readonly name: string;
  readonly op: NodeKind;
  readonly target: string;
  readonly args: readonly Argument[];
  readonly kwargs: Readonly<Record<string, Argument>>;

  constructor(
    graph: Graph,
    name: string,
    op: NodeKind,
    target: string,
    args: readonly Argument[],
    kwargs: Readonly<Record<string, Argument>>,
  ) {
    this.graph = graph;
    this.name = name;
    this.op = op;
    this.target = target;
    this.args = args;
    this.kwargs = kwargs;
  }

  /**
   * Distinct nodes referenced by args and kwargs, in first-appearance order.
   */
  inputNodes(): Node[] {
    const seen = new Set<Node>();
    const visit = (arg: Argument): void => {
      mapArgument(arg, (node) => {
        seen.add(node);
        return node;
      });
    };
    this.args.forEach(visit);
    Object.values(this.kwargs).forEach(visit);
    return [...seen];
  }

  toString(): string {
    return `%${this.name}`;
  }
}

/**
 * Apply `fn` to every node inside `arg`, preserving container shape.
 */
export function mapArgument(arg: Argument, fn: (node: Node) => Argument): Argument {
  if (arg instanceof Node) {
    return fn(arg);
  }
  if (Array.isArray(arg)) {
    return arg.map((item) => mapArgument(item, fn));
  }
  if (typeof arg === "object" && arg !== null) {
    const out: { [key: string]: Argument } = {};
    for (const [key, value] of Object.entries(arg)) {
      out[key] = mapArgument(value, fn);
    }
    return out;
  }
  return arg;
}
