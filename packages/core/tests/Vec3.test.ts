import { describe, it, expect } from "vitest";
import { Vec3 } from "../src/math/Vec3.js";

describe("Vec3", () => {
  it("defaults to zero vector", () => {
    const v = new Vec3();
    expect(v.x).toBe(0);
    expect(v.y).toBe(0);
    expect(v.z).toBe(0);
  });

  it("fromArray() and toArray() round-trip", () => {
    expect(Vec3.fromArray([1, 2, 3]).toArray()).toEqual([1, 2, 3]);
  });

  it("add()", () => {
    expect(new Vec3(1, 2, 3).add(new Vec3(4, 5, 6)).toArray()).toEqual([5, 7, 9]);
  });

  it("subtract()", () => {
    expect(new Vec3(5, 7, 9).subtract(new Vec3(1, 2, 3)).toArray()).toEqual([4, 5, 6]);
  });

  it("scale()", () => {
    expect(new Vec3(1, 2, 3).scale(2).toArray()).toEqual([2, 4, 6]);
  });

  it("keeps double precision", () => {
    // 0.1 is not representable as a float32; a Float32Array result would drift.
    expect(new Vec3(0.1, 0.2, 0.3).scale(1).toArray()).toEqual([0.1, 0.2, 0.3]);
  });

  it("dot()", () => {
    expect(new Vec3(1, 0, 0).dot(new Vec3(0, 1, 0))).toBe(0);
    expect(new Vec3(2, 3, 4).dot(new Vec3(1, 1, 1))).toBe(9);
  });

  it("equals() with epsilon", () => {
    const a = new Vec3(1, 2, 3);
    const b = new Vec3(1 + 1e-7, 2 + 1e-7, 3 + 1e-7);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Vec3(1.1, 2, 3))).toBe(false);
  });

  it("toString()", () => {
    expect(new Vec3(1, 2, 3).toString()).toBe("Vec3(1, 2, 3)");
  });
});
