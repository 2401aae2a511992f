import { describe, expect, it } from "vitest";
import { full, ones, randn, Tensor, tensor, zeros } from "../src/frontend-tensor";
import * as F from "../src/nn/functional";

describe("tensor creation", () => {
  it("validates shape size", () => {
    expect(() => tensor([1, 2], [3])).toThrow("Tensor data length does not match shape");
  });

  it("fills constant tensors", () => {
    expect(zeros([2]).toArray()).toEqual([0, 0]);
    expect(ones([1, 2]).toArray()).toEqual([1, 1]);
    expect(full([3], 7).toArray()).toEqual([7, 7, 7]);
    expect(randn([5]).shape).toEqual([5]);
  });

  it("item requires a single element", () => {
    expect(tensor([4]).item()).toBe(4);
    expect(() => tensor([1, 2]).item()).toThrow("single-element");
  });
});

describe("elementwise ops", () => {
  it("adds two tensors elementwise", () => {
    const out = tensor([1, 2, 3, 4], [2, 2]).add(tensor([5, 6, 7, 8], [2, 2]));

    expect(out.shape).toEqual([2, 2]);
    expect(out.toArray()).toEqual([6, 8, 10, 12]);
  });

  it("broadcasts across dimensions", () => {
    const out = tensor([1, 2, 3, 4], [2, 2]).add(tensor([10, 20], [2]));

    expect(out.toArray()).toEqual([11, 22, 13, 24]);
  });

  it("throws on incompatible shapes", () => {
    expect(() => tensor([1, 2, 3, 4], [2, 2]).add(tensor([1, 2, 3]))).toThrow("broadcast");
  });

  it("accepts scalar operands", () => {
    const a = tensor([2, 4]);

    expect(a.sub(1).toArray()).toEqual([1, 3]);
    expect(a.div(2).toArray()).toEqual([1, 2]);
    expect(F.mul(3, a).toArray()).toEqual([6, 12]);
    expect(a.neg().toArray()).toEqual([-2, -4]);
  });

  it("applies unary functions", () => {
    expect(F.relu(tensor([-1, 1])).toArray()).toEqual([0, 1]);
    expect(F.exp(tensor([0])).toArray()).toEqual([1]);
    expect(F.sigmoid(tensor([0])).toArray()).toEqual([0.5]);
  });
});

describe("linear algebra", () => {
  it("multiplies matrices", () => {
    const out = F.matmul(tensor([1, 2, 3, 4], [2, 2]), tensor([5, 6, 7, 8], [2, 2]));

    expect(out.toArray()).toEqual([19, 22, 43, 50]);
  });

  it("transposes the last two dimensions", () => {
    const out = tensor([1, 2, 3, 4, 5, 6], [2, 3]).transpose();

    expect(out.shape).toEqual([3, 2]);
    expect(out.toArray()).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("reshapes with an inferred dimension", () => {
    const out = F.reshape(zeros([8]), [-1, 4]);

    expect(out.shape).toEqual([2, 4]);
    expect(() => zeros([8]).reshape([3, -1])).toThrow("Cannot reshape");
  });
});

describe("reductions", () => {
  const a = tensor([1, 2, 3, 4], [2, 2]);

  it("sums over a dimension", () => {
    expect(F.sum(a, { dim: 0 }).toArray()).toEqual([4, 6]);
    const kept = a.sum({ dim: 1, keepdim: true });
    expect(kept.shape).toEqual([2, 1]);
    expect(kept.toArray()).toEqual([3, 7]);
  });

  it("averages everything by default", () => {
    const out = F.mean(a);

    expect(out.shape).toEqual([]);
    expect(out.item()).toBe(2.5);
  });

  it("softmax rows sum to one", () => {
    const out = F.softmax(tensor([1, 2, 3, 0, 0, 0], [2, 3])).toArray();

    expect(out[0] + out[1] + out[2]).toBeCloseTo(1, 5);
    expect(out.slice(3)).toEqual([1 / 3, 1 / 3, 1 / 3].map((x) => Math.fround(x)));
  });
});

describe("functional layers", () => {
  it("linear without bias", () => {
    const weight = tensor([1, 0, 0, 1, 1, 1], [3, 2]);

    expect(F.linear(tensor([2, 3], [1, 2]), weight, null).toArray()).toEqual([2, 3, 5]);
  });

  it("layerNorm applies the affine transform", () => {
    const out = F.layerNorm(tensor([1, 1], [1, 2]), tensor([2, 2]), tensor([5, 6]));

    expect(out.toArray()).toEqual([5, 6]);
  });

  it("dropout keeps the input outside training", () => {
    const input = tensor([1, 2]);

    expect(F.dropout(input, { training: false })).toBe(input);
    expect(F.dropout(input, { p: 0 })).toBe(input);
    expect(() => F.dropout(input, { p: -0.1 })).toThrow("between 0 and 1");
  });

  it("returns tensors", () => {
    expect(F.tanh(tensor([0]))).toBeInstanceOf(Tensor);
  });
});
