import { GraphError } from "./errors";
import { type Argument, mapArgument, Node, type NodeKind } from "./node";

/**
 * Derive a node-name base from a target: leading `*` markers are dropped and
 * anything that is not an identifier character becomes `_`.
 */
export function sanitizeName(target: string): string {
  const stripped = target.replace(/^\*+/, "").replace(/[^A-Za-z0-9_]/g, "_");
  if (stripped === "" || /^[0-9]/.test(stripped)) {
    return `_${stripped}`;
  }
  return stripped;
}

function formatArg(arg: Argument): string {
  if (arg instanceof Node) return arg.toString();
  if (Array.isArray(arg)) return `[${arg.map(formatArg).join(", ")}]`;
  if (typeof arg === "string") return JSON.stringify(arg);
  if (arg === undefined) return "undefined";
  if (typeof arg === "object" && arg !== null) {
    const entries = Object.entries(arg).map(([key, value]) => `${key}: ${formatArg(value)}`);
    return `{${entries.join(", ")}}`;
  }
  return String(arg);
}

function formatArgsTuple(args: readonly Argument[]): string {
  if (args.length === 1) return `(${formatArg(args[0])},)`;
  return `(${args.map(formatArg).join(", ")})`;
}

/**
 * Append-only list of IR nodes in execution order, terminated by exactly
 * one `output` node.
 */
export class Graph {
  private readonly nodeList: Node[] = [];
  private readonly usedNames = new Set<string>();
  private readonly nameCounters = new Map<string, number>();
  private outputNode: Node | null = null;
  private frozen = false;

  get nodes(): readonly Node[] {
    return this.nodeList;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** The terminal node, once `output()` has been called. */
  get result(): Node | null {
    return this.outputNode;
  }

  placeholders(): Node[] {
    return this.nodeList.filter((node) => node.op === "placeholder");
  }

  createNode(
    op: NodeKind,
    target: string,
    args: readonly Argument[] = [],
    kwargs: Readonly<Record<string, Argument>> = {},
    name?: string,
  ): Node {
    if (this.frozen) {
      throw new GraphError("cannot add nodes to a frozen graph");
    }
    if (this.outputNode !== null) {
      throw new GraphError("cannot add nodes after the output node");
    }
    for (const arg of [...args, ...Object.values(kwargs)]) {
      mapArgument(arg, (node) => {
        if (node.graph !== this) {
          throw new GraphError(`argument %${node.name} belongs to a different graph`);
        }
        return node;
      });
    }
    const node = new Node(this, this.uniqueName(name ?? target), op, target, args, kwargs);
    this.nodeList.push(node);
    return node;
  }

  placeholder(name: string): Node {
    return this.createNode("placeholder", name);
  }

  getConstant(qualifiedName: string): Node {
    return this.createNode("get_constant", qualifiedName);
  }

  callModule(
    target: string,
    args: readonly Argument[],
    kwargs: Readonly<Record<string, Argument>> = {},
  ): Node {
    return this.createNode("call_module", target, args, kwargs);
  }

  callMethod(
    method: string,
    args: readonly Argument[],
    kwargs: Readonly<Record<string, Argument>> = {},
  ): Node {
    return this.createNode("call_method", method, args, kwargs);
  }

  callFunction(
    fn: string,
    args: readonly Argument[],
    kwargs: Readonly<Record<string, Argument>> = {},
  ): Node {
    return this.createNode("call_function", fn, args, kwargs);
  }

  output(result: Argument): Node {
    if (this.outputNode !== null) {
      throw new GraphError("graph already has an output node");
    }
    const node = this.createNode("output", "output", [result]);
    this.outputNode = node;
    return node;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Check structural invariants: unique names, every input defined earlier
   * in this graph, and a single trailing output node.
   */
  lint(): void {
    const seen = new Set<Node>();
    const names = new Set<string>();
    for (const node of this.nodeList) {
      if (names.has(node.name)) {
        throw new GraphError(`duplicate node name ${node.name}`);
      }
      names.add(node.name);
      for (const input of node.inputNodes()) {
        if (input.graph !== this) {
          throw new GraphError(`%${node.name} references a node from another graph`);
        }
        if (!seen.has(input)) {
          throw new GraphError(`%${node.name} uses %${input.name} before it is defined`);
        }
      }
      seen.add(node);
    }
    const outputs = this.nodeList.filter((node) => node.op === "output");
    if (outputs.length !== 1) {
      throw new GraphError(`graph must have exactly one output node, found ${outputs.length}`);
    }
    if (this.nodeList[this.nodeList.length - 1] !== outputs[0]) {
      throw new GraphError("output node must be the last node");
    }
  }

  toString(): string {
    const header = `graph(${this.placeholders().map((node) => node.name).join(", ")}):`;
    const lines = this.nodeList.map((node) => {
      const head = `%${node.name} = ${node.op}[target=${node.target}]`;
      if (node.op === "placeholder" || node.op === "get_constant") {
        return `    ${head}`;
      }
      return `    ${head}(args = ${formatArgsTuple(node.args)}, kwargs = ${formatArg({ ...node.kwargs })})`;
    });
    return [header, ...lines].join("\n");
  }

  private uniqueName(candidate: string): string {
    const base = sanitizeName(candidate);
    let name = base;
    if (this.usedNames.has(name)) {
      let counter = this.nameCounters.get(base) ?? 1;
      while (this.usedNames.has(`${base}_${counter}`)) {
        counter += 1;
      }
      name = `${base}_${counter}`;
      this.nameCounters.set(base, counter + 1);
    }
    this.usedNames.add(name);
    return name;
  }
}
