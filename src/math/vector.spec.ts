import { describe, expect, it } from "vitest";
import { Angle } from "./angle";
import { Quaternion } from "./quaternion";
import { Vector3, Vector4 } from "./vector";

describe("Vector3", () => {
  it.each`
    lhs                     | rhs                     | expected
    ${{ x: 1, y: 0, z: 0 }} | ${{ x: 0, y: 1, z: 0 }} | ${[0, 0, 1]}
    ${{ x: 0, y: 1, z: 0 }} | ${{ x: 0, y: 0, z: 1 }} | ${[1, 0, 0]}
    ${{ x: 2, y: 3, z: 4 }} | ${{ x: 5, y: 6, z: 7 }} | ${[-3, 6, -3]}
  `("should compute cross product of $lhs and $rhs", ({ lhs, rhs, expected }) => {
    const vector = Vector3.fromSource(lhs, ["cross", rhs]);

    expect(Vector3.toArray(vector)).toEqual(expected);
  });

  it("should normalize non-zero vector", () => {
    const vector = Vector3.fromSource({ x: 3, y: 0, z: 4 });

    expect(vector.normalize()).toBe(true);
    expect(vector.getNorm()).toBeCloseTo(1, 6);
    expect(vector.x).toBeCloseTo(0.6, 6);
    expect(vector.z).toBeCloseTo(0.8, 6);
  });

  it("should not normalize zero vector", () => {
    expect(Vector3.fromSource({ x: 0, y: 0, z: 0 }).normalize()).toBe(false);
  });

  it("should rotate by quaternion", () => {
    const quaternion = Quaternion.fromIdentity([
      "setFromAxisAngle",
      { x: 0, y: 0, z: 1 },
      Angle.fromDegrees(90),
    ]);
    const vector = Vector3.fromSource({ x: 1, y: 0, z: 0 }, [
      "rotate",
      quaternion,
    ]);

    expect(vector.x).toBeCloseTo(0, 6);
    expect(vector.y).toBeCloseTo(1, 6);
    expect(vector.z).toBeCloseTo(0, 6);
  });
});

describe("Vector4", () => {
  it("should subtract, scale and compute dot product", () => {
    const vector = Vector4.fromSource(
      { x: 1, y: 2, z: 3, w: 4 },
      ["sub", { x: 1, y: 1, z: 1, w: 1 }],
      ["scale", 2]
    );

    expect(Vector4.toArray(vector)).toEqual([0, 2, 4, 6]);
    expect(vector.getDot({ x: 1, y: 1, z: 1, w: 1 })).toBe(12);
  });
});
