import type { AnyModule } from "../nn/module";
import { GraphModule } from "./graph-module";
import { Tracer, type TracerOptions } from "./tracer";

/**
 * Trace `root` with a fresh `Tracer` and pair the resulting graph with it.
 *
 * @example
 * ```ts
 * const gm = symbolicTrace(model);
 * console.log(gm.toString());
 * const y = gm.run(x);
 * ```
 */
export function symbolicTrace(root: AnyModule, options?: TracerOptions): GraphModule {
  const graph = new Tracer(options).trace(root);
  return new GraphModule(root, graph);
}
