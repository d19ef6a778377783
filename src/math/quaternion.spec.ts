import { describe, expect, it } from "vitest";
import { Angle } from "./angle";
import { Quaternion } from "./quaternion";

describe("Quaternion", () => {
  it.each`
    lhs                                             | rhs                                             | expected
    ${{ scalar: 0, vector: { x: 3, y: 0, z: -1 } }} | ${{ scalar: 2, vector: { x: 0, y: 1, z: 1 } }}  | ${{ scalar: 1, vector: { x: 7, y: -3, z: 1 } }}
    ${{ scalar: 2, vector: { x: 0, y: 1, z: 1 } }}  | ${{ scalar: 0, vector: { x: 3, y: 0, z: -1 } }} | ${{ scalar: 1, vector: { x: 5, y: 3, z: -5 } }}
  `("should multiply $lhs by $rhs", ({ lhs, rhs, expected }) => {
    const q1 = Quaternion.fromSource(lhs);
    const q2 = Quaternion.fromSource(rhs);

    q1.multiply(q2);

    expect(q1).toEqual(Quaternion.fromSource(expected));
  });

  it("should build rotation from axis and angle", () => {
    const quaternion = Quaternion.fromIdentity([
      "setFromAxisAngle",
      { x: 0, y: 0, z: 1 },
      Angle.fromDegrees(90),
    ]);

    expect(quaternion.scalar).toBeCloseTo(Math.SQRT1_2, 6);
    expect(quaternion.vector.x).toBe(0);
    expect(quaternion.vector.y).toBe(0);
    expect(quaternion.vector.z).toBeCloseTo(Math.SQRT1_2, 6);
    expect(quaternion.getNormSquare()).toBeCloseTo(1, 6);
  });

  it("should invert quaternion", () => {
    const quaternion = Quaternion.fromSource({
      scalar: 1,
      vector: { x: 1, y: 0, z: 0 },
    });
    const inverse = Quaternion.fromSource(quaternion);

    expect(inverse.invert()).toBe(true);
    expect(inverse.scalar).toBe(0.5);
    expect(inverse.vector.x).toBe(-0.5);

    quaternion.multiply(inverse);

    expect(quaternion.scalar).toBe(1);
    expect(quaternion.vector.x).toBeCloseTo(0, 6);
    expect(quaternion.vector.y).toBeCloseTo(0, 6);
    expect(quaternion.vector.z).toBeCloseTo(0, 6);
  });

  it("should not invert zero quaternion", () => {
    const zero = Quaternion.fromSource({
      scalar: 0,
      vector: { x: 0, y: 0, z: 0 },
    });

    expect(zero.invert()).toBe(false);
  });
});
