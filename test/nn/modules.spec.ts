/**
 * Tests for nn modules: Linear, LayerNorm, Dropout, containers
 */
import { describe, expect, it } from "vitest";
import { Parameter, type Tensor, tensor } from "../../src/frontend-tensor";
import { Dropout, Identity, LayerNorm, Linear, Module, ModuleList, ReLU, Sequential, Tanh } from "../../src/nn";
import { currentModuleCallHook, moduleCallHookDepth, withModuleCallHook } from "../../src/nn/hooks";
import { isStandardModule } from "../../src/nn/standard";

describe("nn.Linear", () => {
  it("creates weight and bias with correct shapes", () => {
    const linear = new Linear(4, 8);

    expect(linear.inFeatures).toBe(4);
    expect(linear.outFeatures).toBe(8);
    expect(linear.weight.shape).toEqual([8, 4]); // [outFeatures, inFeatures]
    expect(linear.bias?.shape).toEqual([8]);
  });

  it("creates without bias when bias=false", () => {
    const linear = new Linear(4, 8, { bias: false });

    expect(linear.bias).toBeNull();
    expect(linear.namedParameters().map(([name]) => name)).toEqual(["weight"]);
  });

  it("forward works with 3D input", () => {
    const linear = new Linear(4, 8);
    const input = tensor(Array.from({ length: 24 }, () => 1), [2, 3, 4]);

    expect(linear.forward(input).shape).toEqual([2, 3, 8]);
  });

  it("computes x @ W^T + b", () => {
    const linear = new Linear(2, 2);
    linear.weight.data.set([1, 2, 3, 4]);
    linear.bias?.data.set([1, 1]);

    expect(linear.call(tensor([1, 1], [1, 2])).toArray()).toEqual([4, 8]);
  });
});

describe("nn.LayerNorm", () => {
  it("normalizes the last dimension", () => {
    const norm = new LayerNorm(4);
    const out = norm.forward(tensor([1, 2, 3, 4], [1, 4])).toArray();

    expect(out[0]).toBeCloseTo(-1.5 / Math.sqrt(1.25), 3);
    expect(out.reduce((acc, x) => acc + x, 0)).toBeCloseTo(0, 5);
  });

  it("skips affine parameters when disabled", () => {
    const norm = new LayerNorm(4, { elementwiseAffine: false });

    expect(norm.weight).toBeNull();
    expect(norm.parameters()).toEqual([]);
  });
});

describe("nn.Dropout", () => {
  it("validates p", () => {
    expect(() => new Dropout({ p: 1.5 })).toThrow("between 0 and 1");
  });

  it("returns the input unchanged in eval mode", () => {
    const dropout = new Dropout({ p: 0.9 }).eval();
    const input = tensor([1, 2, 3]);

    expect(dropout.forward(input)).toBe(input);
  });
});

describe("activations", () => {
  it("applies relu, tanh and identity", () => {
    const input = tensor([-1, 0, 2]);

    expect(new ReLU().call(input).toArray()).toEqual([0, 0, 2]);
    expect(new Tanh().call(tensor([0])).toArray()).toEqual([0]);
    expect(new Identity().call(input)).toBe(input);
  });
});

describe("containers", () => {
  it("Sequential registers children by index", () => {
    const seq = new Sequential(new Linear(2, 3), new ReLU());

    expect(seq.length).toBe(2);
    expect(seq.at(1)).toBeInstanceOf(ReLU);
    expect(seq.namedModules().map(([name]) => name)).toEqual(["", "0", "1"]);
    expect(seq.namedParameters().map(([name]) => name)).toEqual(["0.weight", "0.bias"]);
    expect(seq.call(tensor([1, 1], [1, 2])).shape).toEqual([1, 3]);
  });

  it("ModuleList holds children but is not callable", () => {
    const list = new ModuleList<Module<[Tensor]>>([new ReLU()]).append(new Tanh());

    expect(list.length).toBe(2);
    expect([...list].map((module) => module.constructor.name)).toEqual(["ReLU", "Tanh"]);
    expect(list.namedModules("blocks").map(([name]) => name)).toEqual([
      "blocks",
      "blocks.0",
      "blocks.1",
    ]);
    expect(() => list.forward()).toThrow("not callable");
  });

  it("propagates train and eval", () => {
    const seq = new Sequential(new Dropout(), new Sequential(new Dropout()));
    seq.eval();

    expect(seq.modules().every((module) => !module.training)).toBe(true);
    seq.train();
    expect(seq.modules().every((module) => module.training)).toBe(true);
  });
});

describe("Module", () => {
  it("reports a shared parameter once", () => {
    const shared = Parameter.from(tensor([1]));
    class Tied extends Module<[Tensor]> {
      readonly a = this.registerParameter("a", shared);
      readonly b = this.registerParameter("b", shared);

      forward(x: Tensor): Tensor {
        return x.mul(this.a).mul(this.b);
      }
    }

    expect(new Tied().namedParameters()).toEqual([["a", shared]]);
  });

  it("registers buffers as enumerable attributes", () => {
    class Buffered extends Module<[Tensor]> {
      constructor() {
        super();
        this.registerBuffer("running", tensor([0, 0]));
      }

      forward(x: Tensor): Tensor {
        return x;
      }
    }
    const module = new Buffered();

    expect(module.buffers()).toHaveLength(1);
    expect(Object.keys(module)).toContain("running");
  });

  it("rejects dotted attribute names", () => {
    const seq = new Sequential();

    expect(() => seq.registerModule("a.b", new ReLU())).toThrow('contain no "."');
  });

  it("classifies standard modules by exact constructor", () => {
    class CustomLinear extends Linear {}

    expect(isStandardModule(new Linear(1, 1))).toBe(true);
    expect(isStandardModule(new CustomLinear(1, 1))).toBe(false);
  });
});

describe("module-call hooks", () => {
  it("call defers to the innermost hook", () => {
    const relu = new ReLU();
    const input = tensor([-1]);
    const outer = tensor([1]);
    const inner = tensor([2]);

    const result = withModuleCallHook(
      () => outer,
      () => [relu.call(input), withModuleCallHook(() => inner, () => relu.call(input))],
    );

    expect(result).toEqual([outer, inner]);
    expect(currentModuleCallHook()).toBeUndefined();
  });

  it("removes the hook when the callback throws", () => {
    expect(() =>
      withModuleCallHook(
        () => tensor([0]),
        () => {
          throw new Error("boom");
        },
      ),
    ).toThrow("boom");
    expect(moduleCallHookDepth()).toBe(0);
  });
});
