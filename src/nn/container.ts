/**
 * Container modules.
 */

import type { Tensor } from "../frontend-tensor";
import { type AnyModule, Module } from "./module";

/**
 * Chains single-input modules; each child's output feeds the next. Children
 * are registered under their index ("0", "1", ...).
 */
export class Sequential extends Module<[Tensor]> {
  private readonly layers: Module<[Tensor]>[];

  constructor(...layers: Module<[Tensor]>[]) {
    super();
    this.layers = layers.map((layer, i) => this.registerModule(String(i), layer));
  }

  get length(): number {
    return this.layers.length;
  }

  at(index: number): Module<[Tensor]> | undefined {
    return this.layers.at(index);
  }

  forward(input: Tensor): Tensor {
    let out = input;
    for (const layer of this.layers) {
      out = layer.call(out);
    }
    return out;
  }
}

/**
 * Holds child modules in an indexable list. Not callable on its own.
 */
export class ModuleList<M extends AnyModule = AnyModule> extends Module<never[]> {
  private readonly items: M[] = [];

  constructor(modules: M[] = []) {
    super();
    for (const module of modules) {
      this.append(module);
    }
  }

  get length(): number {
    return this.items.length;
  }

  append(module: M): this {
    this.items.push(this.registerModule(String(this.items.length), module));
    return this;
  }

  at(index: number): M | undefined {
    return this.items.at(index);
  }

  [Symbol.iterator](): Iterator<M> {
    return this.items[Symbol.iterator]();
  }

  forward(): Tensor {
    throw new Error("ModuleList is not callable; call its children instead");
  }
}
