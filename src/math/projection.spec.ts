import { describe, expect, it } from "vitest";
import { Angle } from "./angle";
import { Matrix4 } from "./matrix";
import { frustum, ortho, perspective } from "./projection";

describe("ortho", () => {
  it("should map box to clip space", () => {
    const matrix = ortho(0, 2, 0, 2, 0, 2);

    expect(Matrix4.toArray(matrix)).toEqual([
      1, 0, 0, 0, 0, 1, 0, 0, 0, 0, -1, 0, -1, -1, -1, 1,
    ]);
  });
});

describe("frustum", () => {
  it("should build symmetric frustum", () => {
    const matrix = frustum(-1, 1, -1, 1, 1, 3);

    expect(Matrix4.toArray(matrix)).toEqual([
      1, 0, 0, 0, 0, 1, 0, 0, 0, 0, -2, -1, 0, 0, -3, 0,
    ]);
  });

  it("should offset asymmetric frustum", () => {
    const matrix = frustum(0, 2, 0, 4, 1, 3);

    expect(matrix.getValue(2, 0)).toBe(1);
    expect(matrix.getValue(2, 1)).toBe(1);
    expect(matrix.getValue(0, 0)).toBe(1);
    expect(matrix.getValue(1, 1)).toBe(0.5);
  });
});

describe("perspective", () => {
  it.each`
    fovy  | aspect | near   | far
    ${60} | ${1}   | ${1}   | ${10}
    ${45} | ${1.5} | ${0.1} | ${100}
  `(
    "should match frustum for $fovy degrees and $aspect aspect ratio",
    ({ fovy, aspect, near, far }) => {
      const y = near * Math.tan(Angle.fromDegrees(fovy / 2).radians);
      const x = y * aspect;

      expect(
        perspective(fovy, aspect, near, far).isEqual(
          frustum(-x, x, -y, y, near, far)
        )
      ).toBe(true);
    }
  );

  it("should match cotangent form", () => {
    const matrix = perspective(90, 2, 1, 3);

    expect(matrix.getValue(0, 0)).toBeCloseTo(0.5, 6);
    expect(matrix.getValue(1, 1)).toBeCloseTo(1, 6);
    expect(matrix.getValue(2, 2)).toBe(-2);
    expect(matrix.getValue(2, 3)).toBe(-1);
    expect(matrix.getValue(3, 2)).toBe(-3);
    expect(matrix.getValue(3, 3)).toBe(0);
  });
});
