export class UnregisteredParameterError extends Error {
  name = "UnregisteredParameterError";
}

export class UnregisteredModuleError extends Error {
  name = "UnregisteredModuleError";
}

export class UnrepresentableArgumentError extends Error {
  name = "UnrepresentableArgumentError";
}

/** Misuse of a symbolic value, or of a tracer, while tracing. */
export class TraceError extends Error {
  name = "TraceError";
}

export class GraphError extends Error {
  name = "GraphError";
}
