/**
 * Base Module class for neural network layers.
 * Similar to PyTorch's nn.Module.
 */

import type { Parameter, Tensor } from "../frontend-tensor";
import { currentModuleCallHook } from "./hooks";

export type AnyModule = Module<unknown[]>;

function checkAttributeName(kind: string, name: string): void {
  if (name === "" || name.includes(".")) {
    throw new Error(`${kind} name must be non-empty and contain no ".", got "${name}"`);
  }
}

export abstract class Module<In extends unknown[] = Tensor[]> {
  private trainingMode = true;
  private readonly _parameters = new Map<string, Parameter>();
  private readonly _buffers = new Map<string, Tensor>();
  private readonly _modules = new Map<string, AnyModule>();

  /**
   * Check if module is in training mode.
   */
  get training(): boolean {
    return this.trainingMode;
  }

  /**
   * Register a learnable parameter. The parameter is also set as a property
   * on `this`, so `this.weight = this.registerParameter("weight", p)` and
   * plain `this.registerParameter("weight", p)` are equivalent.
   */
  registerParameter<P extends Parameter>(name: string, parameter: P): P {
    checkAttributeName("parameter", name);
    this._parameters.set(name, parameter);
    this.defineAttribute(name, parameter);
    return parameter;
  }

  /**
   * Register a buffer (non-parameter persistent tensor) on this module.
   * The tensor is stored in _buffers and also set as a property on `this`.
   */
  registerBuffer<T extends Tensor>(name: string, tensor: T): T {
    checkAttributeName("buffer", name);
    this._buffers.set(name, tensor);
    this.defineAttribute(name, tensor);
    return tensor;
  }

  /**
   * Register a child module. Children are reachable through namedModules()
   * and receive train()/eval() propagation.
   */
  registerModule<M extends AnyModule>(name: string, module: M): M {
    checkAttributeName("module", name);
    this._modules.set(name, module);
    this.defineAttribute(name, module);
    return module;
  }

  /**
   * Parameters of this module and its descendants with dotted names. A
   * parameter reachable under several names is reported once, under the
   * first name found.
   */
  namedParameters(prefix = ""): Array<[string, Parameter]> {
    const seen = new Set<Parameter>();
    const result: Array<[string, Parameter]> = [];
    for (const [modulePrefix, module] of this.namedModules(prefix)) {
      for (const [name, parameter] of module._parameters) {
        if (seen.has(parameter)) continue;
        seen.add(parameter);
        result.push([modulePrefix ? `${modulePrefix}.${name}` : name, parameter]);
      }
    }
    return result;
  }

  parameters(): Parameter[] {
    return this.namedParameters().map(([, parameter]) => parameter);
  }

  /**
   * Return all registered buffers, optionally recursing into child modules.
   */
  buffers(recurse = true): Tensor[] {
    const result = [...this._buffers.values()];
    if (recurse) {
      for (const child of this._modules.values()) {
        result.push(...child.buffers(true));
      }
    }
    return result;
  }

  /**
   * Direct children in registration order.
   */
  namedChildren(): Array<[string, AnyModule]> {
    const seen = new Set<AnyModule>();
    const result: Array<[string, AnyModule]> = [];
    for (const [name, child] of this._modules) {
      if (seen.has(child)) continue;
      seen.add(child);
      result.push([name, child]);
    }
    return result;
  }

  children(): AnyModule[] {
    return this.namedChildren().map(([, child]) => child);
  }

  /**
   * This module (under `prefix`, "" for the root) followed by every
   * descendant in depth-first registration order, each reported once.
   */
  namedModules(prefix = ""): Array<[string, AnyModule]> {
    const seen = new Set<AnyModule>();
    const result: Array<[string, AnyModule]> = [];
    const visit = (module: AnyModule, path: string): void => {
      if (seen.has(module)) return;
      seen.add(module);
      result.push([path, module]);
      for (const [name, child] of module._modules) {
        visit(child, path ? `${path}.${name}` : name);
      }
    };
    visit(this, prefix);
    return result;
  }

  /**
   * Return all modules in the tree, this one included.
   */
  modules(): AnyModule[] {
    return this.namedModules().map(([, module]) => module);
  }

  /**
   * Set module to training mode.
   * In training mode, dropout is active, etc.
   * Recursively sets all registered child modules.
   */
  train(mode = true): this {
    this.trainingMode = mode;
    for (const child of this._modules.values()) {
      child.train(mode);
    }
    return this;
  }

  /**
   * Set module to evaluation mode.
   * Equivalent to train(false).
   */
  eval(): this {
    return this.train(false);
  }

  /**
   * Forward pass. Subclasses must implement this.
   */
  abstract forward(...inputs: In): Tensor;

  /**
   * Callable interface. Runs forward(), unless a module-call hook (such as
   * an active trace) is installed, in which case the hook decides.
   */
  call(...inputs: In): Tensor {
    const hook = currentModuleCallHook();
    return hook ? hook(this, inputs) : this.forward(...inputs);
  }

  private defineAttribute(name: string, value: unknown): void {
    Object.defineProperty(this, name, {
      value,
      writable: true,
      configurable: true,
      enumerable: true,
    });
  }
}
