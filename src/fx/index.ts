/**
 * Symbolic tracing: record a module's forward computation as a graph.
 */

export { ArityAdapter, declaredParameters, type ParameterKind, type DeclaredParameter } from "./arity";
export {
  GraphError,
  TraceError,
  UnregisteredModuleError,
  UnregisteredParameterError,
  UnrepresentableArgumentError,
} from "./errors";
export { Graph, sanitizeName } from "./graph";
export { GraphModule } from "./graph-module";
export { type Argument, type ArgumentLiteral, mapArgument, Node, type NodeKind } from "./node";
export { symbolicTrace } from "./symbolic-trace";
export { isSymbolic } from "./symbolic";
export { type ModuleType, Tracer, type TracerOptions, type TraceState } from "./tracer";
export { TracerBase } from "./tracer-base";
