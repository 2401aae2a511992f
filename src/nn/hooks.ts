/**
 * Module-call hooks.
 *
 * `Module.call` consults the innermost installed hook, if any, instead of
 * running `forward` directly. Hooks are installed for the dynamic extent of a
 * callback and always removed on exit, including when the callback throws.
 */

import type { Tensor } from "../frontend-tensor";
import type { Module } from "./module";

export type ModuleCallHook = (module: Module<unknown[]>, inputs: unknown[]) => Tensor;

const hookStack: ModuleCallHook[] = [];

export function currentModuleCallHook(): ModuleCallHook | undefined {
  return hookStack[hookStack.length - 1];
}

export function moduleCallHookDepth(): number {
  return hookStack.length;
}

export function withModuleCallHook<T>(hook: ModuleCallHook, fn: () => T): T {
  hookStack.push(hook);
  try {
    return fn();
  } finally {
    hookStack.pop();
  }
}
