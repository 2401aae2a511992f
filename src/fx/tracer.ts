/**
 * Symbolic tracing of module trees.
 *
 * A trace runs the root's forward exactly once with one symbolic placeholder
 * per declared parameter. While it runs, a module-call hook routes every
 * `Module.call` in the process through this tracer: leaf modules become
 * `call_module` nodes without running, other modules run their real forward
 * so that their own calls come back through the hook. Parameters and
 * constant tensors reached as arguments become `get_constant` nodes.
 */

import { Parameter, Tensor } from "../frontend-tensor";
import { Sequential } from "../nn/container";
import { withModuleCallHook } from "../nn/hooks";
import type { AnyModule } from "../nn/module";
import { isStandardModule } from "../nn/standard";
import { ArityAdapter } from "./arity";
import { TraceError, UnregisteredModuleError, UnregisteredParameterError } from "./errors";
import type { Graph } from "./graph";
import type { Argument } from "./node";
import { isSymbolic } from "./symbolic";
import { DEBUG_TRACE, TracerBase } from "./tracer-base";

export type ModuleType = abstract new (...args: never[]) => AnyModule;

export type TracerOptions = {
  /**
   * Decide per module instance whether it is a leaf. Replaces the default
   * policy when given.
   */
  isLeafModule?: (module: AnyModule, qualifiedName: string) => boolean;
  /**
   * Standard module types that are traced through rather than recorded.
   * Default: [Sequential]
   */
  traceThroughTypes?: readonly ModuleType[];
};

export type TraceState =
  | "idle"
  | "placeholders_built"
  | "interceptor_installed"
  | "executing"
  | "output_captured"
  | "interceptor_removed";

const NEXT_STATE: Partial<Record<TraceState, TraceState>> = {
  idle: "placeholders_built",
  placeholders_built: "interceptor_installed",
  interceptor_installed: "executing",
  executing: "output_captured",
  output_captured: "interceptor_removed",
};

const HOOK_INSTALLED: ReadonlySet<TraceState> = new Set<TraceState>([
  "interceptor_installed",
  "executing",
  "output_captured",
]);

/**
 * Interception frame for one module call being dispatched by this tracer.
 * `redirected` is set before the tracer decides how to run the call; a
 * nested call on the same module under a redirected frame is the tracer's
 * own dispatch re-entering `Module.call` and runs unrecorded.
 */
type ModuleCallFrame = {
  readonly module: AnyModule;
  redirected: boolean;
};

const CONSTANT_PREFIX = "_tensor_constant";

export class Tracer extends TracerBase {
  private readonly options: TracerOptions;
  private rootModule: AnyModule | null = null;
  private state: TraceState = "idle";
  private readonly callFrames: ModuleCallFrame[] = [];
  private moduleNames: Map<AnyModule, string> | null = null;
  private parameterNames: Map<Parameter, string> | null = null;
  private tensorNames: Map<Tensor, string> | null = null;

  constructor(options: TracerOptions = {}) {
    super();
    this.options = options;
  }

  /** The module being traced. Throws outside a trace. */
  get root(): AnyModule {
    if (this.rootModule === null) {
      throw new TraceError("no trace in progress");
    }
    return this.rootModule;
  }

  get traceState(): TraceState {
    return this.state;
  }

  /**
   * Trace `root.forward` into a frozen graph. The module-call hook is
   * installed only while forward runs and is removed on every exit path; a
   * failed trace discards its partial graph.
   *
   * `traceState` ends at `"interceptor_removed"` on success and on any
   * failure after the hook was installed. A failure before that (an
   * unreadable forward signature) leaves it at `"idle"`.
   */
  trace(root: AnyModule): Graph {
    if (this.rootModule !== null) {
      throw new TraceError("tracer is already tracing a module");
    }
    this.rootModule = root;
    this.state = "idle";
    const graph = this.beginGraph();
    if (DEBUG_TRACE) {
      console.log(`[trace] begin ${root.constructor.name}`);
    }
    try {
      const adapter = ArityAdapter.forFunction(root.forward);
      const placeholders = adapter
        .placeholderTargets()
        .map((target) => this.createProxy("placeholder", target, []));
      this.advance("placeholders_built");

      withModuleCallHook(this.interceptModuleCall, () => {
        this.advance("interceptor_installed");
        this.advance("executing");
        const result = adapter.apply(root, placeholders);
        graph.output(this.createArg(result));
        this.advance("output_captured");
      });
      this.advance("interceptor_removed");

      graph.freeze().lint();
      if (DEBUG_TRACE) {
        console.log(`[trace] end ${root.constructor.name}: ${graph.nodes.length} nodes`);
      }
      return graph;
    } finally {
      if (HOOK_INSTALLED.has(this.traceState)) {
        this.state = "interceptor_removed";
      } else if (this.traceState !== "interceptor_removed") {
        this.state = "idle";
      }
      this.endGraph();
      this.rootModule = null;
      this.callFrames.length = 0;
      this.moduleNames = null;
      this.parameterNames = null;
      this.tensorNames = null;
    }
  }

  /**
   * Whether `module` is recorded as a single `call_module` node. Default:
   * standard library modules, except the trace-through container types.
   */
  isLeafModule(module: AnyModule, qualifiedName: string): boolean {
    if (this.options.isLeafModule) {
      return this.options.isLeafModule(module, qualifiedName);
    }
    const traceThrough = this.options.traceThroughTypes ?? [Sequential];
    return isStandardModule(module) && !traceThrough.some((type) => module instanceof type);
  }

  /**
   * Dispatch an intercepted module call. Leaves become `call_module` nodes;
   * anything else runs its real forward through `module.call`, which the
   * active frame turns into a direct, unrecorded invocation.
   */
  callModule(module: AnyModule, target: string, inputs: unknown[]): Tensor {
    if (!this.isLeafModule(module, target)) {
      return module.call(...inputs);
    }
    return this.createProxy("call_module", target, inputs);
  }

  createArg(value: unknown): Argument {
    if (isSymbolic(value)) {
      return super.createArg(value);
    }
    if (value instanceof Parameter) {
      const name = this.parameterName(value);
      if (name === undefined) {
        throw new UnregisteredParameterError(
          `parameter of shape [${value.shape}] is not registered anywhere under the traced module`,
        );
      }
      return this.recordNode(this.graph.getConstant(name));
    }
    if (value instanceof Tensor) {
      return this.recordNode(this.graph.getConstant(this.constantName(value)));
    }
    return super.createArg(value);
  }

  /** Qualified name of `module` under the root, found by identity. */
  qualifiedModuleName(module: AnyModule): string {
    let name = this.moduleNames?.get(module);
    if (name === undefined || this.resolve(name) !== module) {
      // Modules can be registered or replaced while forward runs.
      this.moduleNames = new Map(
        this.root.namedModules().map(([qualified, m]): [AnyModule, string] => [m, qualified]),
      );
      name = this.moduleNames.get(module);
    }
    if (name === undefined) {
      throw new UnregisteredModuleError(
        `${module.constructor.name} is not registered as a submodule of the traced module`,
      );
    }
    return name;
  }

  private readonly interceptModuleCall = (module: AnyModule, inputs: unknown[]): Tensor => {
    const enclosing = this.callFrames[this.callFrames.length - 1];
    if (enclosing !== undefined && enclosing.module === module && enclosing.redirected) {
      return module.forward(...inputs);
    }
    const target = this.qualifiedModuleName(module);
    const frame: ModuleCallFrame = { module, redirected: false };
    this.callFrames.push(frame);
    try {
      frame.redirected = true;
      return this.callModule(module, target, inputs);
    } finally {
      this.callFrames.pop();
    }
  };

  private advance(next: TraceState): void {
    if (NEXT_STATE[this.state] !== next) {
      throw new TraceError(`invalid trace transition ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  /** Value at dotted `path` under the root; "" is the root itself. */
  private resolve(path: string): unknown {
    let current: unknown = this.root;
    for (const segment of path === "" ? [] : path.split(".")) {
      if (typeof current !== "object" || current === null) {
        return undefined;
      }
      current = Reflect.get(current, segment);
    }
    return current;
  }

  private parameterName(parameter: Parameter): string | undefined {
    const name = this.parameterNames?.get(parameter);
    if (name !== undefined && this.resolve(name) === parameter) {
      return name;
    }
    this.parameterNames = new Map(
      this.root.namedParameters().map(([qualified, p]): [Parameter, string] => [p, qualified]),
    );
    return this.parameterNames.get(parameter);
  }

  /**
   * Dotted path of the first attribute holding `tensor`, searching the
   * root's own attributes and then each child depth-first. Tensors found
   * nowhere are attached to the root under a fresh `_tensor_constant{i}`.
   *
   * The search is served from an identity index built once per trace. A
   * miss, or a hit whose path no longer holds `tensor`, rebuilds it.
   */
  private constantName(tensor: Tensor): string {
    const cached = this.tensorNames?.get(tensor);
    if (cached !== undefined && this.resolve(cached) === tensor) {
      return cached;
    }
    this.tensorNames = this.buildTensorIndex();
    const found = this.tensorNames.get(tensor);
    if (found !== undefined) {
      return found;
    }
    return this.stowConstant(tensor);
  }

  private buildTensorIndex(): Map<Tensor, string> {
    const index = new Map<Tensor, string>();
    const visited = new Set<AnyModule>();
    const visit = (module: AnyModule, path: string[]): void => {
      if (visited.has(module)) return;
      visited.add(module);
      for (const [key, value] of Object.entries(module)) {
        if (value instanceof Tensor && !isSymbolic(value) && !index.has(value)) {
          index.set(value, [...path, key].join("."));
        }
      }
      for (const [name, child] of module.namedChildren()) {
        visit(child, [...path, name]);
      }
    };
    visit(this.root, []);
    return index;
  }

  private stowConstant(tensor: Tensor): string {
    const root = this.root;
    let i = 0;
    while (`${CONSTANT_PREFIX}${i}` in root) {
      i += 1;
    }
    const name = `${CONSTANT_PREFIX}${i}`;
    Object.defineProperty(root, name, {
      value: tensor,
      writable: true,
      configurable: true,
      enumerable: true,
    });
    this.tensorNames?.set(tensor, name);
    if (DEBUG_TRACE) {
      console.log(`[trace] attached constant of shape [${tensor.shape}] as ${name}`);
    }
    return name;
  }
}
