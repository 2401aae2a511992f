/**
 * Fixed-arity calling convention over a forward method's declared
 * parameters.
 *
 * Parameters are read from the function's source with the TypeScript parser.
 * A rest parameter (`...rest`) and a destructuring parameter with a rest
 * element (`{ scale, ...kw }`) each count as one slot, so the adapter's arity
 * is the number of placeholders a trace creates. The target itself is never
 * modified.
 */

import * as ts from "typescript";
import { TraceError } from "./errors";

export type ParameterKind = "positional" | "rest" | "keywords";

export type DeclaredParameter = {
  /** Declared name; `arg{index}` for destructuring without a rest element */
  name: string;
  kind: ParameterKind;
  /** Position in the declaration */
  index: number;
};

type Introspectable = (...args: never[]) => unknown;

type FunctionLike = ts.FunctionExpression | ts.ArrowFunction | ts.MethodDeclaration;

function parseExpression(source: string): ts.Expression | undefined {
  const file = ts.createSourceFile("target.js", source, ts.ScriptTarget.Latest, false, ts.ScriptKind.JS);
  const statement = file.statements[0];
  if (file.statements.length !== 1 || !statement || !ts.isExpressionStatement(statement)) {
    return undefined;
  }
  let expression = statement.expression;
  while (ts.isParenthesizedExpression(expression)) {
    expression = expression.expression;
  }
  return expression;
}

function parseFunctionLike(source: string): FunctionLike | undefined {
  // `function f(x) {}`, `function (x) {}`, `(x) => x`
  const asExpression = parseExpression(`(${source});`);
  if (asExpression && (ts.isFunctionExpression(asExpression) || ts.isArrowFunction(asExpression))) {
    return asExpression;
  }
  // Method shorthand as printed by Function.prototype.toString: `forward(x) {}`
  const asMember = parseExpression(`({ ${source} });`);
  if (asMember && ts.isObjectLiteralExpression(asMember)) {
    const member = asMember.properties[0];
    if (asMember.properties.length === 1 && member && ts.isMethodDeclaration(member)) {
      return member;
    }
  }
  return undefined;
}

function keywordsRestName(pattern: ts.ObjectBindingPattern): string | undefined {
  for (const element of pattern.elements) {
    if (element.dotDotDotToken && ts.isIdentifier(element.name)) {
      return element.name.text;
    }
  }
  return undefined;
}

/**
 * Declared parameters of `fn`, in declaration order.
 */
export function declaredParameters(fn: Introspectable): DeclaredParameter[] {
  const source = Function.prototype.toString.call(fn);
  if (/\{\s*\[native code\]\s*\}\s*$/.test(source)) {
    throw new TraceError(`cannot read the parameter list of native or bound function ${fn.name || "<anonymous>"}`);
  }
  const declaration = parseFunctionLike(source);
  if (!declaration) {
    throw new TraceError(`cannot parse the parameter list of ${fn.name || "<anonymous>"}`);
  }
  return declaration.parameters.map((param, index): DeclaredParameter => {
    if (param.dotDotDotToken) {
      const name = ts.isIdentifier(param.name) ? param.name.text : `arg${index}`;
      return { name, kind: "rest", index };
    }
    if (ts.isIdentifier(param.name)) {
      return { name: param.name.text, kind: "positional", index };
    }
    if (ts.isObjectBindingPattern(param.name)) {
      const restName = keywordsRestName(param.name);
      if (restName !== undefined) {
        return { name: restName, kind: "keywords", index };
      }
    }
    return { name: `arg${index}`, kind: "positional", index };
  });
}

/** Placeholder target for a parameter: `x`, `*rest`, `**kw`. */
export function placeholderTarget(parameter: DeclaredParameter): string {
  switch (parameter.kind) {
    case "positional":
      return parameter.name;
    case "rest":
      return `*${parameter.name}`;
    case "keywords":
      return `**${parameter.name}`;
  }
}

const SLOT_ORDER: Record<ParameterKind, number> = { positional: 0, rest: 1, keywords: 2 };

export class ArityAdapter {
  /** Declared parameters, in declaration order. */
  readonly parameters: readonly DeclaredParameter[];
  /** Parameters in slot order: positional, then rest, then keywords. */
  readonly slots: readonly DeclaredParameter[];
  private readonly target: Introspectable;

  private constructor(target: Introspectable, parameters: DeclaredParameter[]) {
    this.target = target;
    this.parameters = parameters;
    this.slots = [...parameters].sort(
      (a, b) => SLOT_ORDER[a.kind] - SLOT_ORDER[b.kind] || a.index - b.index,
    );
    if (parameters.filter((p) => p.kind === "keywords").length > 1) {
      throw new TraceError("at most one keywords parameter is supported");
    }
  }

  static forFunction(fn: Introspectable): ArityAdapter {
    return new ArityAdapter(fn, declaredParameters(fn));
  }

  get arity(): number {
    return this.slots.length;
  }

  get isVariadic(): boolean {
    return this.parameters.some((p) => p.kind !== "positional");
  }

  placeholderTargets(): string[] {
    return this.slots.map(placeholderTarget);
  }

  /**
   * Call the target with exactly `arity` arguments in slot order, binding one
   * argument per declared parameter. A rest parameter receives its argument
   * as the single element of the tail.
   */
  apply(receiver: object, args: readonly unknown[]): unknown {
    if (args.length !== this.arity) {
      throw new TraceError(`expected ${this.arity} arguments, got ${args.length}`);
    }
    const byParameter = new Map<DeclaredParameter, unknown>();
    this.slots.forEach((parameter, i) => byParameter.set(parameter, args[i]));
    const callArgs = this.parameters.map((parameter) => byParameter.get(parameter));
    return Reflect.apply(this.target, receiver, callArgs);
  }
}
