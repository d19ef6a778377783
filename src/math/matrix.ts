import { InvokeOf, invokeOnObject } from "../language/dynamic";
import { Angle } from "./angle";
import { MutableQuaternion, Quaternion } from "./quaternion";
import { isFuzzyEqual, isFuzzyZero } from "./scalar";
import {
  MutableVector2,
  MutableVector3,
  MutableVector4,
  Vector2,
  Vector3,
  Vector4,
} from "./vector";

/**
 * Read-only operations available on every square matrix. None of them
 * modifies the instance they're called on, matrices returned are new copies.
 */
interface SquareMatrix<TMatrix, TVector> {
  getColumn(index: number): TVector;
  getDeterminant(): number;
  getDifference(rhs: TMatrix): TMatrix;
  /**
   * Inner product defined as trace(transpose(rhs) * this).
   */
  getDot(rhs: TMatrix): number;
  /**
   * Inverse matrix, or undefined if determinant is (almost) zero.
   */
  getInverse(): TMatrix | undefined;
  getNegated(): TMatrix;
  getProduct(rhs: TMatrix): TMatrix;
  getRow(index: number): TVector;
  getScaled(factor: number): TMatrix;
  getSum(rhs: TMatrix): TMatrix;
  getTrace(): number;
  getTransformed(vector: TVector): TVector;
  getTransposed(): TMatrix;
  getValue(column: number, row: number): number;
  isDiagonal(): boolean;
  isEqual(rhs: TMatrix): boolean;
  isFuzzyEqual(rhs: TMatrix): boolean;
  isIdentity(): boolean;
  isInvertible(): boolean;
  isRotated(): boolean;
  isSymmetric(): boolean;
}

/**
 * In-place counterparts of square matrix operations.
 */
interface MutableSquareMatrix<TMatrix, TVector, TMutableVector extends TVector>
  extends SquareMatrix<TMatrix, TVector> {
  add(rhs: TMatrix): void;
  /**
   * Replace matrix by its inverse, callers should check `isInvertible` first
   * as this method throws when matrix has no inverse.
   */
  invert(): void;
  multiply(rhs: TMatrix): void;
  negate(): void;
  scale(factor: number): void;
  set(source: TMatrix): void;
  setColumn(index: number, column: TVector): void;
  setIdentity(): void;
  setZero(): void;
  sub(rhs: TMatrix): void;
  swapColumns(a: number, b: number): void;
  swapRows(a: number, b: number): void;
  transpose(): void;
  updateColumn(index: number, updater: (column: TMutableVector) => void): void;
}

type MatrixKeys<TKey extends string> = readonly (readonly TKey[])[];

const invalidIndex = (dimension: number, index: number) =>
  Error(
    `index out of bounds: expected an index from 0 to ${
      dimension - 1
    }, but found ${index}`
  );

const notInvertible = () => Error("matrix is not invertible");

const checkIndex = (dimension: number, index: number): void => {
  if (!Number.isInteger(index) || index < 0 || index >= dimension) {
    throw invalidIndex(dimension, index);
  }
};

const combineOf = <TKey extends string>(
  target: Record<TKey, number>,
  rhs: Readonly<Record<TKey, number>>,
  keys: MatrixKeys<TKey>,
  operator: (lhs: number, rhs: number) => number
): void => {
  for (const column of keys) {
    for (const key of column) {
      target[key] = operator(target[key], rhs[key]);
    }
  }
};

const isDiagonalOf = <TKey extends string>(
  matrix: Readonly<Record<TKey, number>>,
  keys: MatrixKeys<TKey>
): boolean => {
  for (let column = 0; column < keys.length; ++column) {
    for (let row = 0; row < keys.length; ++row) {
      if (column !== row && !isFuzzyZero(matrix[keys[column][row]])) {
        return false;
      }
    }
  }

  return true;
};

const isEqualOf = <TKey extends string>(
  lhs: Readonly<Record<TKey, number>>,
  rhs: Readonly<Record<TKey, number>>,
  keys: MatrixKeys<TKey>,
  comparer: (lhs: number, rhs: number) => boolean
): boolean => {
  for (const column of keys) {
    for (const key of column) {
      if (!comparer(lhs[key], rhs[key])) {
        return false;
      }
    }
  }

  return true;
};

const isSymmetricOf = <TKey extends string>(
  matrix: Readonly<Record<TKey, number>>,
  keys: MatrixKeys<TKey>
): boolean => {
  for (let column = 0; column < keys.length; ++column) {
    for (let row = column + 1; row < keys.length; ++row) {
      if (
        !isFuzzyEqual(matrix[keys[column][row]], matrix[keys[row][column]])
      ) {
        return false;
      }
    }
  }

  return true;
};

const mapOf = <TKey extends string>(
  target: Record<TKey, number>,
  keys: MatrixKeys<TKey>,
  callback: (value: number) => number
): void => {
  for (const column of keys) {
    for (const key of column) {
      target[key] = callback(target[key]);
    }
  }
};

const swapOf = <TKey extends string>(
  target: Record<TKey, number>,
  key1: TKey,
  key2: TKey
): void => {
  const value = target[key1];

  target[key1] = target[key2];
  target[key2] = value;
};

const swapRowsOf = <TKey extends string>(
  target: Record<TKey, number>,
  keys: MatrixKeys<TKey>,
  a: number,
  b: number
): void => {
  checkIndex(keys.length, a);
  checkIndex(keys.length, b);

  for (const column of keys) {
    swapOf(target, column[a], column[b]);
  }
};

const toArrayOf = <TKey extends string>(
  matrix: Readonly<Record<TKey, number>>,
  keys: MatrixKeys<TKey>
): number[] => keys.flatMap((column) => column.map((key) => matrix[key]));

const transposeOf = <TKey extends string>(
  target: Record<TKey, number>,
  keys: MatrixKeys<TKey>
): void => {
  for (let column = 0; column < keys.length; ++column) {
    for (let row = column + 1; row < keys.length; ++row) {
      swapOf(target, keys[column][row], keys[row][column]);
    }
  }
};

interface Matrix2 {
  readonly v00: number;
  readonly v01: number;
  readonly v10: number;
  readonly v11: number;
}

type Matrix2Key = keyof Matrix2;

const matrix2Keys = [
  ["v00", "v01"],
  ["v10", "v11"],
] as const satisfies MatrixKeys<Matrix2Key>;

class MutableMatrix2
  implements
    Matrix2,
    MutableSquareMatrix<Matrix2, Vector2, MutableVector2>
{
  public v00: number;
  public v01: number;
  public v10: number;
  public v11: number;

  public constructor(source: Matrix2) {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v10 = source.v10;
    this.v11 = source.v11;
  }

  public add(rhs: Matrix2): void {
    combineOf<Matrix2Key>(this, rhs, matrix2Keys, (l, r) => l + r);
  }

  public getColumn(index: number): MutableVector2 {
    switch (index) {
      case 0:
        return new MutableVector2(this.v00, this.v01);

      case 1:
        return new MutableVector2(this.v10, this.v11);

      default:
        throw invalidIndex(2, index);
    }
  }

  public getDeterminant(): number {
    return this.v00 * this.v11 - this.v10 * this.v01;
  }

  public getDifference(rhs: Matrix2): MutableMatrix2 {
    return Matrix2.fromSource(this, ["sub", rhs]);
  }

  public getDot(rhs: Matrix2): number {
    return Matrix2.fromSource(rhs, ["transpose"], ["multiply", this]).getTrace();
  }

  public getInverse(): MutableMatrix2 | undefined {
    const determinant = this.getDeterminant();

    if (isFuzzyZero(determinant)) {
      return undefined;
    }

    return Matrix2.fromSource({
      v00: this.v11 / determinant,
      v01: -this.v01 / determinant,
      v10: -this.v10 / determinant,
      v11: this.v00 / determinant,
    });
  }

  public getNegated(): MutableMatrix2 {
    return Matrix2.fromSource(this, ["negate"]);
  }

  public getProduct(rhs: Matrix2): MutableMatrix2 {
    return Matrix2.fromSource(this, ["multiply", rhs]);
  }

  public getRow(index: number): MutableVector2 {
    switch (index) {
      case 0:
        return new MutableVector2(this.v00, this.v10);

      case 1:
        return new MutableVector2(this.v01, this.v11);

      default:
        throw invalidIndex(2, index);
    }
  }

  public getScaled(factor: number): MutableMatrix2 {
    return Matrix2.fromSource(this, ["scale", factor]);
  }

  public getSum(rhs: Matrix2): MutableMatrix2 {
    return Matrix2.fromSource(this, ["add", rhs]);
  }

  public getTrace(): number {
    return this.v00 + this.v11;
  }

  public getTransformed(vector: Vector2): MutableVector2 {
    return new MutableVector2(
      this.getRow(0).getDot(vector),
      this.getRow(1).getDot(vector)
    );
  }

  public getTransposed(): MutableMatrix2 {
    return Matrix2.fromSource(this, ["transpose"]);
  }

  public getValue(column: number, row: number): number {
    checkIndex(2, column);
    checkIndex(2, row);

    return this[matrix2Keys[column][row]];
  }

  public invert(): void {
    const inverse = this.getInverse();

    if (inverse === undefined) {
      throw notInvertible();
    }

    this.set(inverse);
  }

  public isDiagonal(): boolean {
    return isDiagonalOf<Matrix2Key>(this, matrix2Keys);
  }

  public isEqual(rhs: Matrix2): boolean {
    return isEqualOf<Matrix2Key>(this, rhs, matrix2Keys, (l, r) => l === r);
  }

  public isFuzzyEqual(rhs: Matrix2): boolean {
    return isEqualOf<Matrix2Key>(this, rhs, matrix2Keys, isFuzzyEqual);
  }

  public isIdentity(): boolean {
    return this.isFuzzyEqual(Matrix2.identity);
  }

  public isInvertible(): boolean {
    return !isFuzzyZero(this.getDeterminant());
  }

  public isRotated(): boolean {
    return !this.isIdentity();
  }

  public isSymmetric(): boolean {
    return isSymmetricOf<Matrix2Key>(this, matrix2Keys);
  }

  public multiply(rhs: Matrix2): void {
    const t00 = this.v00 * rhs.v00 + this.v10 * rhs.v01;
    const t01 = this.v01 * rhs.v00 + this.v11 * rhs.v01;
    const t10 = this.v00 * rhs.v10 + this.v10 * rhs.v11;
    const t11 = this.v01 * rhs.v10 + this.v11 * rhs.v11;

    this.v00 = t00;
    this.v01 = t01;
    this.v10 = t10;
    this.v11 = t11;
  }

  public negate(): void {
    mapOf<Matrix2Key>(this, matrix2Keys, (v) => -v);
  }

  public scale(factor: number): void {
    mapOf<Matrix2Key>(this, matrix2Keys, (v) => v * factor);
  }

  public set(source: Matrix2): void {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v10 = source.v10;
    this.v11 = source.v11;
  }

  public setColumn(index: number, column: Vector2): void {
    switch (index) {
      case 0:
        this.v00 = column.x;
        this.v01 = column.y;

        break;

      case 1:
        this.v10 = column.x;
        this.v11 = column.y;

        break;

      default:
        throw invalidIndex(2, index);
    }
  }

  public setFromArray(values: ArrayLike<number>): void {
    if (values.length < 4) {
      throw Error("Matrix2 must be created from array with 4+ elements");
    }

    this.v00 = values[0];
    this.v01 = values[1];
    this.v10 = values[2];
    this.v11 = values[3];
  }

  public setIdentity(): void {
    this.set(Matrix2.identity);
  }

  public setZero(): void {
    this.set(Matrix2.zero);
  }

  public sub(rhs: Matrix2): void {
    combineOf<Matrix2Key>(this, rhs, matrix2Keys, (l, r) => l - r);
  }

  public swapColumns(a: number, b: number): void {
    const columnA = this.getColumn(a);
    const columnB = this.getColumn(b);

    this.setColumn(a, columnB);
    this.setColumn(b, columnA);
  }

  public swapRows(a: number, b: number): void {
    swapRowsOf<Matrix2Key>(this, matrix2Keys, a, b);
  }

  public transpose(): void {
    transposeOf<Matrix2Key>(this, matrix2Keys);
  }

  public updateColumn(
    index: number,
    updater: (column: MutableVector2) => void
  ): void {
    const column = this.getColumn(index);

    updater(column);

    this.setColumn(index, column);
  }
}

class Matrix2 {
  public static readonly dimension = 2;

  public static fromArray(
    values: ArrayLike<number>,
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return Matrix2.fromZero(["setFromArray", values], ...invokes);
  }

  public static fromColumns(
    c0: Vector2,
    c1: Vector2,
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return Matrix2.fromSource(
      { v00: c0.x, v01: c0.y, v10: c1.x, v11: c1.y },
      ...invokes
    );
  }

  public static fromIdentity(
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return invokeOnObject(new MutableMatrix2(Matrix2.identity), invokes);
  }

  public static fromSource(
    source: Matrix2,
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return invokeOnObject(new MutableMatrix2(source), invokes);
  }

  /**
   * Create diagonal matrix with all main diagonal elements set to `value`.
   */
  public static fromValue(
    value: number,
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return Matrix2.fromIdentity(["scale", value], ...invokes);
  }

  public static fromZero(
    ...invokes: InvokeOf<MutableMatrix2>[]
  ): MutableMatrix2 {
    return invokeOnObject(new MutableMatrix2(Matrix2.zero), invokes);
  }

  public static toArray(matrix: Matrix2): number[] {
    return toArrayOf<Matrix2Key>(matrix, matrix2Keys);
  }

  public static readonly identity: Matrix2 = {
    v00: 1,
    v01: 0,
    v10: 0,
    v11: 1,
  };

  public static readonly zero: Matrix2 = {
    v00: 0,
    v01: 0,
    v10: 0,
    v11: 0,
  };
}

interface Matrix3 {
  readonly v00: number;
  readonly v01: number;
  readonly v02: number;
  readonly v10: number;
  readonly v11: number;
  readonly v12: number;
  readonly v20: number;
  readonly v21: number;
  readonly v22: number;
}

type Matrix3Key = keyof Matrix3;

const matrix3Keys = [
  ["v00", "v01", "v02"],
  ["v10", "v11", "v12"],
  ["v20", "v21", "v22"],
] as const satisfies MatrixKeys<Matrix3Key>;

class MutableMatrix3
  implements
    Matrix3,
    MutableSquareMatrix<Matrix3, Vector3, MutableVector3>
{
  public v00: number;
  public v01: number;
  public v02: number;
  public v10: number;
  public v11: number;
  public v12: number;
  public v20: number;
  public v21: number;
  public v22: number;

  public constructor(source: Matrix3) {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = source.v02;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = source.v12;
    this.v20 = source.v20;
    this.v21 = source.v21;
    this.v22 = source.v22;
  }

  public add(rhs: Matrix3): void {
    combineOf<Matrix3Key>(this, rhs, matrix3Keys, (l, r) => l + r);
  }

  public getColumn(index: number): MutableVector3 {
    switch (index) {
      case 0:
        return new MutableVector3(this.v00, this.v01, this.v02);

      case 1:
        return new MutableVector3(this.v10, this.v11, this.v12);

      case 2:
        return new MutableVector3(this.v20, this.v21, this.v22);

      default:
        throw invalidIndex(3, index);
    }
  }

  /**
   * Scalar triple product c0 . (c1 x c2) of column vectors.
   */
  public getDeterminant(): number {
    const c1c2 = Vector3.fromSource(this.getColumn(1), [
      "cross",
      this.getColumn(2),
    ]);

    return this.getColumn(0).getDot(c1c2);
  }

  public getDifference(rhs: Matrix3): MutableMatrix3 {
    return Matrix3.fromSource(this, ["sub", rhs]);
  }

  public getDot(rhs: Matrix3): number {
    return Matrix3.fromSource(rhs, ["transpose"], ["multiply", this]).getTrace();
  }

  /**
   * Adjugate over determinant, where adjugate rows are built from cross
   * products of column pairs.
   */
  public getInverse(): MutableMatrix3 | undefined {
    const determinant = this.getDeterminant();

    if (isFuzzyZero(determinant)) {
      return undefined;
    }

    const c0 = this.getColumn(0);
    const c1 = this.getColumn(1);
    const c2 = this.getColumn(2);
    const factor = 1 / determinant;

    return Matrix3.fromColumns(
      Vector3.fromSource(c1, ["cross", c2], ["scale", factor]),
      Vector3.fromSource(c2, ["cross", c0], ["scale", factor]),
      Vector3.fromSource(c0, ["cross", c1], ["scale", factor]),
      ["transpose"]
    );
  }

  public getNegated(): MutableMatrix3 {
    return Matrix3.fromSource(this, ["negate"]);
  }

  public getProduct(rhs: Matrix3): MutableMatrix3 {
    return Matrix3.fromSource(this, ["multiply", rhs]);
  }

  /**
   * Convert rotation matrix into a unit quaternion. Extraction uses the trace
   * when it's non-negative, otherwise starts from the largest diagonal
   * element so that the square root argument stays far from zero.
   * From: https://www.cs.ucr.edu/~vbz/resources/quatut.pdf
   */
  public getQuaternion(): MutableQuaternion {
    const trace = this.getTrace();
    const quaternion = Quaternion.fromIdentity();

    if (trace >= 0) {
      const s = Math.sqrt(1 + trace);
      const t = 0.5 / s;

      quaternion.setFromWXYZ(
        0.5 * s,
        (this.v12 - this.v21) * t,
        (this.v20 - this.v02) * t,
        (this.v01 - this.v10) * t
      );
    } else if (this.v00 > this.v11 && this.v00 > this.v22) {
      const s = Math.sqrt(1 + this.v00 - this.v11 - this.v22);
      const t = 0.5 / s;

      quaternion.setFromWXYZ(
        (this.v12 - this.v21) * t,
        0.5 * s,
        (this.v01 + this.v10) * t,
        (this.v20 + this.v02) * t
      );
    } else if (this.v11 > this.v22) {
      const s = Math.sqrt(1 + this.v11 - this.v00 - this.v22);
      const t = 0.5 / s;

      quaternion.setFromWXYZ(
        (this.v20 - this.v02) * t,
        (this.v01 + this.v10) * t,
        0.5 * s,
        (this.v12 + this.v21) * t
      );
    } else {
      const s = Math.sqrt(1 + this.v22 - this.v00 - this.v11);
      const t = 0.5 / s;

      quaternion.setFromWXYZ(
        (this.v01 - this.v10) * t,
        (this.v20 + this.v02) * t,
        (this.v12 + this.v21) * t,
        0.5 * s
      );
    }

    return quaternion;
  }

  public getRow(index: number): MutableVector3 {
    switch (index) {
      case 0:
        return new MutableVector3(this.v00, this.v10, this.v20);

      case 1:
        return new MutableVector3(this.v01, this.v11, this.v21);

      case 2:
        return new MutableVector3(this.v02, this.v12, this.v22);

      default:
        throw invalidIndex(3, index);
    }
  }

  public getScaled(factor: number): MutableMatrix3 {
    return Matrix3.fromSource(this, ["scale", factor]);
  }

  public getSum(rhs: Matrix3): MutableMatrix3 {
    return Matrix3.fromSource(this, ["add", rhs]);
  }

  public getTrace(): number {
    return this.v00 + this.v11 + this.v22;
  }

  public getTransformed(vector: Vector3): MutableVector3 {
    return new MutableVector3(
      this.getRow(0).getDot(vector),
      this.getRow(1).getDot(vector),
      this.getRow(2).getDot(vector)
    );
  }

  public getTransposed(): MutableMatrix3 {
    return Matrix3.fromSource(this, ["transpose"]);
  }

  public getValue(column: number, row: number): number {
    checkIndex(3, column);
    checkIndex(3, row);

    return this[matrix3Keys[column][row]];
  }

  public invert(): void {
    const inverse = this.getInverse();

    if (inverse === undefined) {
      throw notInvertible();
    }

    this.set(inverse);
  }

  public isDiagonal(): boolean {
    return isDiagonalOf<Matrix3Key>(this, matrix3Keys);
  }

  public isEqual(rhs: Matrix3): boolean {
    return isEqualOf<Matrix3Key>(this, rhs, matrix3Keys, (l, r) => l === r);
  }

  public isFuzzyEqual(rhs: Matrix3): boolean {
    return isEqualOf<Matrix3Key>(this, rhs, matrix3Keys, isFuzzyEqual);
  }

  public isIdentity(): boolean {
    return this.isFuzzyEqual(Matrix3.identity);
  }

  public isInvertible(): boolean {
    return !isFuzzyZero(this.getDeterminant());
  }

  public isRotated(): boolean {
    return !this.isIdentity();
  }

  public isSymmetric(): boolean {
    return isSymmetricOf<Matrix3Key>(this, matrix3Keys);
  }

  public multiply(rhs: Matrix3): void {
    const t00 = this.v00 * rhs.v00 + this.v10 * rhs.v01 + this.v20 * rhs.v02;
    const t01 = this.v01 * rhs.v00 + this.v11 * rhs.v01 + this.v21 * rhs.v02;
    const t02 = this.v02 * rhs.v00 + this.v12 * rhs.v01 + this.v22 * rhs.v02;
    const t10 = this.v00 * rhs.v10 + this.v10 * rhs.v11 + this.v20 * rhs.v12;
    const t11 = this.v01 * rhs.v10 + this.v11 * rhs.v11 + this.v21 * rhs.v12;
    const t12 = this.v02 * rhs.v10 + this.v12 * rhs.v11 + this.v22 * rhs.v12;
    const t20 = this.v00 * rhs.v20 + this.v10 * rhs.v21 + this.v20 * rhs.v22;
    const t21 = this.v01 * rhs.v20 + this.v11 * rhs.v21 + this.v21 * rhs.v22;
    const t22 = this.v02 * rhs.v20 + this.v12 * rhs.v21 + this.v22 * rhs.v22;

    this.v00 = t00;
    this.v01 = t01;
    this.v02 = t02;
    this.v10 = t10;
    this.v11 = t11;
    this.v12 = t12;
    this.v20 = t20;
    this.v21 = t21;
    this.v22 = t22;
  }

  public negate(): void {
    mapOf<Matrix3Key>(this, matrix3Keys, (v) => -v);
  }

  public scale(factor: number): void {
    mapOf<Matrix3Key>(this, matrix3Keys, (v) => v * factor);
  }

  public set(source: Matrix3): void {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = source.v02;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = source.v12;
    this.v20 = source.v20;
    this.v21 = source.v21;
    this.v22 = source.v22;
  }

  public setColumn(index: number, column: Vector3): void {
    switch (index) {
      case 0:
        this.v00 = column.x;
        this.v01 = column.y;
        this.v02 = column.z;

        break;

      case 1:
        this.v10 = column.x;
        this.v11 = column.y;
        this.v12 = column.z;

        break;

      case 2:
        this.v20 = column.x;
        this.v21 = column.y;
        this.v22 = column.z;

        break;

      default:
        throw invalidIndex(3, index);
    }
  }

  public setFromArray(values: ArrayLike<number>): void {
    if (values.length < 9) {
      throw Error("Matrix3 must be created from array with 9+ elements");
    }

    this.v00 = values[0];
    this.v01 = values[1];
    this.v02 = values[2];
    this.v10 = values[3];
    this.v11 = values[4];
    this.v12 = values[5];
    this.v20 = values[6];
    this.v21 = values[7];
    this.v22 = values[8];
  }

  /*
   ** Rotation matrix around a unit axis, counter-clockwise when looking from
   ** axis end toward origin.
   ** From: https://en.wikipedia.org/wiki/Rotation_matrix#Rotation_matrix_from_axis_and_angle
   */
  public setFromAxisAngle(axis: Vector3, angle: Angle): void {
    const { x, y, z } = axis;
    const cos = Math.cos(angle.radians);
    const sin = Math.sin(angle.radians);
    const t = 1 - cos;

    this.v00 = t * x * x + cos;
    this.v01 = t * x * y + sin * z;
    this.v02 = t * x * z - sin * y;
    this.v10 = t * x * y - sin * z;
    this.v11 = t * y * y + cos;
    this.v12 = t * y * z + sin * x;
    this.v20 = t * x * z + sin * y;
    this.v21 = t * y * z - sin * x;
    this.v22 = t * z * z + cos;
  }

  public setFromMatrix2(source: Matrix2): void {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = 0;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = 0;
    this.v20 = 0;
    this.v21 = 0;
    this.v22 = 1;
  }

  /**
   * Create rotation matrix from quaternion.
   * From: https://www.euclideanspace.com/maths/geometry/rotations/conversions/quaternionToMatrix/index.htm
   */
  public setFromQuaternion(quaternion: Quaternion): void {
    const { scalar, vector } = quaternion;
    const { x, y, z } = vector;

    const sx = scalar * x;
    const sy = scalar * y;
    const sz = scalar * z;
    const xx = x * x;
    const xy = x * y;
    const xz = x * z;
    const yy = y * y;
    const yz = y * z;
    const zz = z * z;

    this.v00 = 1 - 2 * (yy + zz);
    this.v01 = 2 * (xy + sz);
    this.v02 = 2 * (xz - sy);
    this.v10 = 2 * (xy - sz);
    this.v11 = 1 - 2 * (xx + zz);
    this.v12 = 2 * (yz + sx);
    this.v20 = 2 * (xz + sy);
    this.v21 = 2 * (yz - sx);
    this.v22 = 1 - 2 * (xx + yy);
  }

  public setIdentity(): void {
    this.set(Matrix3.identity);
  }

  public setZero(): void {
    this.set(Matrix3.zero);
  }

  public sub(rhs: Matrix3): void {
    combineOf<Matrix3Key>(this, rhs, matrix3Keys, (l, r) => l - r);
  }

  public swapColumns(a: number, b: number): void {
    const columnA = this.getColumn(a);
    const columnB = this.getColumn(b);

    this.setColumn(a, columnB);
    this.setColumn(b, columnA);
  }

  public swapRows(a: number, b: number): void {
    swapRowsOf<Matrix3Key>(this, matrix3Keys, a, b);
  }

  public transpose(): void {
    transposeOf<Matrix3Key>(this, matrix3Keys);
  }

  public updateColumn(
    index: number,
    updater: (column: MutableVector3) => void
  ): void {
    const column = this.getColumn(index);

    updater(column);

    this.setColumn(index, column);
  }
}

class Matrix3 {
  public static readonly dimension = 3;

  public static fromArray(
    values: ArrayLike<number>,
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return Matrix3.fromZero(["setFromArray", values], ...invokes);
  }

  public static fromAxisAngle(
    axis: Vector3,
    angle: Angle,
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return Matrix3.fromZero(["setFromAxisAngle", axis, angle], ...invokes);
  }

  public static fromColumns(
    c0: Vector3,
    c1: Vector3,
    c2: Vector3,
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return Matrix3.fromSource(
      {
        v00: c0.x,
        v01: c0.y,
        v02: c0.z,
        v10: c1.x,
        v11: c1.y,
        v12: c1.z,
        v20: c2.x,
        v21: c2.y,
        v22: c2.z,
      },
      ...invokes
    );
  }

  public static fromIdentity(
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return invokeOnObject(new MutableMatrix3(Matrix3.identity), invokes);
  }

  public static fromSource(
    source: Matrix3,
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return invokeOnObject(new MutableMatrix3(source), invokes);
  }

  public static fromValue(
    value: number,
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return Matrix3.fromIdentity(["scale", value], ...invokes);
  }

  public static fromZero(
    ...invokes: InvokeOf<MutableMatrix3>[]
  ): MutableMatrix3 {
    return invokeOnObject(new MutableMatrix3(Matrix3.zero), invokes);
  }

  public static toArray(matrix: Matrix3): number[] {
    return toArrayOf<Matrix3Key>(matrix, matrix3Keys);
  }

  public static readonly identity: Matrix3 = {
    v00: 1,
    v01: 0,
    v02: 0,
    v10: 0,
    v11: 1,
    v12: 0,
    v20: 0,
    v21: 0,
    v22: 1,
  };

  public static readonly zero: Matrix3 = {
    v00: 0,
    v01: 0,
    v02: 0,
    v10: 0,
    v11: 0,
    v12: 0,
    v20: 0,
    v21: 0,
    v22: 0,
  };
}

interface Matrix4 {
  readonly v00: number;
  readonly v01: number;
  readonly v02: number;
  readonly v03: number;
  readonly v10: number;
  readonly v11: number;
  readonly v12: number;
  readonly v13: number;
  readonly v20: number;
  readonly v21: number;
  readonly v22: number;
  readonly v23: number;
  readonly v30: number;
  readonly v31: number;
  readonly v32: number;
  readonly v33: number;
}

type Matrix4Key = keyof Matrix4;

const matrix4Keys = [
  ["v00", "v01", "v02", "v03"],
  ["v10", "v11", "v12", "v13"],
  ["v20", "v21", "v22", "v23"],
  ["v30", "v31", "v32", "v33"],
] as const satisfies MatrixKeys<Matrix4Key>;

class MutableMatrix4
  implements
    Matrix4,
    MutableSquareMatrix<Matrix4, Vector4, MutableVector4>
{
  public v00: number;
  public v01: number;
  public v02: number;
  public v03: number;
  public v10: number;
  public v11: number;
  public v12: number;
  public v13: number;
  public v20: number;
  public v21: number;
  public v22: number;
  public v23: number;
  public v30: number;
  public v31: number;
  public v32: number;
  public v33: number;

  public constructor(source: Matrix4) {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = source.v02;
    this.v03 = source.v03;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = source.v12;
    this.v13 = source.v13;
    this.v20 = source.v20;
    this.v21 = source.v21;
    this.v22 = source.v22;
    this.v23 = source.v23;
    this.v30 = source.v30;
    this.v31 = source.v31;
    this.v32 = source.v32;
    this.v33 = source.v33;
  }

  public add(rhs: Matrix4): void {
    combineOf<Matrix4Key>(this, rhs, matrix4Keys, (l, r) => l + r);
  }

  public getColumn(index: number): MutableVector4 {
    switch (index) {
      case 0:
        return new MutableVector4(this.v00, this.v01, this.v02, this.v03);

      case 1:
        return new MutableVector4(this.v10, this.v11, this.v12, this.v13);

      case 2:
        return new MutableVector4(this.v20, this.v21, this.v22, this.v23);

      case 3:
        return new MutableVector4(this.v30, this.v31, this.v32, this.v33);

      default:
        throw invalidIndex(4, index);
    }
  }

  /**
   * Cofactor expansion along first row, using determinants of the 3x3
   * minors obtained by removing first row and each column in turn.
   */
  public getDeterminant(): number {
    const minor0 = Matrix3.fromSource({
      v00: this.v11,
      v01: this.v12,
      v02: this.v13,
      v10: this.v21,
      v11: this.v22,
      v12: this.v23,
      v20: this.v31,
      v21: this.v32,
      v22: this.v33,
    });

    const minor1 = Matrix3.fromSource({
      v00: this.v01,
      v01: this.v02,
      v02: this.v03,
      v10: this.v21,
      v11: this.v22,
      v12: this.v23,
      v20: this.v31,
      v21: this.v32,
      v22: this.v33,
    });

    const minor2 = Matrix3.fromSource({
      v00: this.v01,
      v01: this.v02,
      v02: this.v03,
      v10: this.v11,
      v11: this.v12,
      v12: this.v13,
      v20: this.v31,
      v21: this.v32,
      v22: this.v33,
    });

    const minor3 = Matrix3.fromSource({
      v00: this.v01,
      v01: this.v02,
      v02: this.v03,
      v10: this.v11,
      v11: this.v12,
      v12: this.v13,
      v20: this.v21,
      v21: this.v22,
      v22: this.v23,
    });

    return (
      this.v00 * minor0.getDeterminant() -
      this.v10 * minor1.getDeterminant() +
      this.v20 * minor2.getDeterminant() -
      this.v30 * minor3.getDeterminant()
    );
  }

  public getDifference(rhs: Matrix4): MutableMatrix4 {
    return Matrix4.fromSource(this, ["sub", rhs]);
  }

  public getDot(rhs: Matrix4): number {
    return Matrix4.fromSource(rhs, ["transpose"], ["multiply", this]).getTrace();
  }

  /**
   * Gauss-Jordan elimination with partial pivoting applied to [A | I], using
   * column operations: once A is reduced to identity, the accumulator that
   * received the same operations holds A^-1.
   */
  public getInverse(): MutableMatrix4 | undefined {
    if (!this.isInvertible()) {
      return undefined;
    }

    const reduced = Matrix4.fromSource(this);
    const inverse = Matrix4.fromIdentity();

    for (let j = 0; j < 4; ++j) {
      // Pick column with largest element on row j as pivot
      let pivot = j;

      for (let i = j + 1; i < 4; ++i) {
        if (
          Math.abs(reduced.getValue(i, j)) >
          Math.abs(reduced.getValue(pivot, j))
        ) {
          pivot = i;
        }
      }

      reduced.swapColumns(pivot, j);
      inverse.swapColumns(pivot, j);

      // Scale pivot column to get a unit diagonal element
      const factor = 1 / reduced.getValue(j, j);

      reduced.updateColumn(j, (column) => column.scale(factor));
      inverse.updateColumn(j, (column) => column.scale(factor));

      // Clear row j on all other columns
      const reducedPivot = reduced.getColumn(j);
      const inversePivot = inverse.getColumn(j);

      for (let i = 0; i < 4; ++i) {
        if (i === j) {
          continue;
        }

        const ratio = reduced.getValue(i, j);

        reduced.updateColumn(i, (column) =>
          column.sub(Vector4.fromSource(reducedPivot, ["scale", ratio]))
        );
        inverse.updateColumn(i, (column) =>
          column.sub(Vector4.fromSource(inversePivot, ["scale", ratio]))
        );
      }
    }

    return inverse;
  }

  public getNegated(): MutableMatrix4 {
    return Matrix4.fromSource(this, ["negate"]);
  }

  public getProduct(rhs: Matrix4): MutableMatrix4 {
    return Matrix4.fromSource(this, ["multiply", rhs]);
  }

  public getRow(index: number): MutableVector4 {
    switch (index) {
      case 0:
        return new MutableVector4(this.v00, this.v10, this.v20, this.v30);

      case 1:
        return new MutableVector4(this.v01, this.v11, this.v21, this.v31);

      case 2:
        return new MutableVector4(this.v02, this.v12, this.v22, this.v32);

      case 3:
        return new MutableVector4(this.v03, this.v13, this.v23, this.v33);

      default:
        throw invalidIndex(4, index);
    }
  }

  public getScaled(factor: number): MutableMatrix4 {
    return Matrix4.fromSource(this, ["scale", factor]);
  }

  public getSum(rhs: Matrix4): MutableMatrix4 {
    return Matrix4.fromSource(this, ["add", rhs]);
  }

  public getTrace(): number {
    return this.v00 + this.v11 + this.v22 + this.v33;
  }

  public getTransformed(vector: Vector4): MutableVector4 {
    return new MutableVector4(
      this.getRow(0).getDot(vector),
      this.getRow(1).getDot(vector),
      this.getRow(2).getDot(vector),
      this.getRow(3).getDot(vector)
    );
  }

  public getTransposed(): MutableMatrix4 {
    return Matrix4.fromSource(this, ["transpose"]);
  }

  public getValue(column: number, row: number): number {
    checkIndex(4, column);
    checkIndex(4, row);

    return this[matrix4Keys[column][row]];
  }

  public invert(): void {
    const inverse = this.getInverse();

    if (inverse === undefined) {
      throw notInvertible();
    }

    this.set(inverse);
  }

  public isDiagonal(): boolean {
    return isDiagonalOf<Matrix4Key>(this, matrix4Keys);
  }

  public isEqual(rhs: Matrix4): boolean {
    return isEqualOf<Matrix4Key>(this, rhs, matrix4Keys, (l, r) => l === r);
  }

  public isFuzzyEqual(rhs: Matrix4): boolean {
    return isEqualOf<Matrix4Key>(this, rhs, matrix4Keys, isFuzzyEqual);
  }

  public isIdentity(): boolean {
    return this.isFuzzyEqual(Matrix4.identity);
  }

  public isInvertible(): boolean {
    return !isFuzzyZero(this.getDeterminant());
  }

  public isRotated(): boolean {
    return !this.isIdentity();
  }

  public isSymmetric(): boolean {
    return isSymmetricOf<Matrix4Key>(this, matrix4Keys);
  }

  public multiply(rhs: Matrix4): void {
    const t00 =
      this.v00 * rhs.v00 +
      this.v10 * rhs.v01 +
      this.v20 * rhs.v02 +
      this.v30 * rhs.v03;
    const t01 =
      this.v01 * rhs.v00 +
      this.v11 * rhs.v01 +
      this.v21 * rhs.v02 +
      this.v31 * rhs.v03;
    const t02 =
      this.v02 * rhs.v00 +
      this.v12 * rhs.v01 +
      this.v22 * rhs.v02 +
      this.v32 * rhs.v03;
    const t03 =
      this.v03 * rhs.v00 +
      this.v13 * rhs.v01 +
      this.v23 * rhs.v02 +
      this.v33 * rhs.v03;
    const t10 =
      this.v00 * rhs.v10 +
      this.v10 * rhs.v11 +
      this.v20 * rhs.v12 +
      this.v30 * rhs.v13;
    const t11 =
      this.v01 * rhs.v10 +
      this.v11 * rhs.v11 +
      this.v21 * rhs.v12 +
      this.v31 * rhs.v13;
    const t12 =
      this.v02 * rhs.v10 +
      this.v12 * rhs.v11 +
      this.v22 * rhs.v12 +
      this.v32 * rhs.v13;
    const t13 =
      this.v03 * rhs.v10 +
      this.v13 * rhs.v11 +
      this.v23 * rhs.v12 +
      this.v33 * rhs.v13;
    const t20 =
      this.v00 * rhs.v20 +
      this.v10 * rhs.v21 +
      this.v20 * rhs.v22 +
      this.v30 * rhs.v23;
    const t21 =
      this.v01 * rhs.v20 +
      this.v11 * rhs.v21 +
      this.v21 * rhs.v22 +
      this.v31 * rhs.v23;
    const t22 =
      this.v02 * rhs.v20 +
      this.v12 * rhs.v21 +
      this.v22 * rhs.v22 +
      this.v32 * rhs.v23;
    const t23 =
      this.v03 * rhs.v20 +
      this.v13 * rhs.v21 +
      this.v23 * rhs.v22 +
      this.v33 * rhs.v23;
    const t30 =
      this.v00 * rhs.v30 +
      this.v10 * rhs.v31 +
      this.v20 * rhs.v32 +
      this.v30 * rhs.v33;
    const t31 =
      this.v01 * rhs.v30 +
      this.v11 * rhs.v31 +
      this.v21 * rhs.v32 +
      this.v31 * rhs.v33;
    const t32 =
      this.v02 * rhs.v30 +
      this.v12 * rhs.v31 +
      this.v22 * rhs.v32 +
      this.v32 * rhs.v33;
    const t33 =
      this.v03 * rhs.v30 +
      this.v13 * rhs.v31 +
      this.v23 * rhs.v32 +
      this.v33 * rhs.v33;

    this.v00 = t00;
    this.v01 = t01;
    this.v02 = t02;
    this.v03 = t03;
    this.v10 = t10;
    this.v11 = t11;
    this.v12 = t12;
    this.v13 = t13;
    this.v20 = t20;
    this.v21 = t21;
    this.v22 = t22;
    this.v23 = t23;
    this.v30 = t30;
    this.v31 = t31;
    this.v32 = t32;
    this.v33 = t33;
  }

  public negate(): void {
    mapOf<Matrix4Key>(this, matrix4Keys, (v) => -v);
  }

  public scale(factor: number): void {
    mapOf<Matrix4Key>(this, matrix4Keys, (v) => v * factor);
  }

  public set(source: Matrix4): void {
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = source.v02;
    this.v03 = source.v03;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = source.v12;
    this.v13 = source.v13;
    this.v20 = source.v20;
    this.v21 = source.v21;
    this.v22 = source.v22;
    this.v23 = source.v23;
    this.v30 = source.v30;
    this.v31 = source.v31;
    this.v32 = source.v32;
    this.v33 = source.v33;
  }

  public setColumn(index: number, column: Vector4): void {
    switch (index) {
      case 0:
        this.v00 = column.x;
        this.v01 = column.y;
        this.v02 = column.z;
        this.v03 = column.w;

        break;

      case 1:
        this.v10 = column.x;
        this.v11 = column.y;
        this.v12 = column.z;
        this.v13 = column.w;

        break;

      case 2:
        this.v20 = column.x;
        this.v21 = column.y;
        this.v22 = column.z;
        this.v23 = column.w;

        break;

      case 3:
        this.v30 = column.x;
        this.v31 = column.y;
        this.v32 = column.z;
        this.v33 = column.w;

        break;

      default:
        throw invalidIndex(4, index);
    }
  }

  public setFromArray(values: ArrayLike<number>): void {
    if (values.length < 16) {
      throw Error("Matrix4 must be created from array with 16+ elements");
    }

    this.v00 = values[0];
    this.v01 = values[1];
    this.v02 = values[2];
    this.v03 = values[3];
    this.v10 = values[4];
    this.v11 = values[5];
    this.v12 = values[6];
    this.v13 = values[7];
    this.v20 = values[8];
    this.v21 = values[9];
    this.v22 = values[10];
    this.v23 = values[11];
    this.v30 = values[12];
    this.v31 = values[13];
    this.v32 = values[14];
    this.v33 = values[15];
  }

  public setFromMatrix2(source: Matrix2): void {
    this.set(Matrix4.identity);
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v10 = source.v10;
    this.v11 = source.v11;
  }

  public setFromMatrix3(source: Matrix3): void {
    this.set(Matrix4.identity);
    this.v00 = source.v00;
    this.v01 = source.v01;
    this.v02 = source.v02;
    this.v10 = source.v10;
    this.v11 = source.v11;
    this.v12 = source.v12;
    this.v20 = source.v20;
    this.v21 = source.v21;
    this.v22 = source.v22;
  }

  public setIdentity(): void {
    this.set(Matrix4.identity);
  }

  public setZero(): void {
    this.set(Matrix4.zero);
  }

  public sub(rhs: Matrix4): void {
    combineOf<Matrix4Key>(this, rhs, matrix4Keys, (l, r) => l - r);
  }

  public swapColumns(a: number, b: number): void {
    const columnA = this.getColumn(a);
    const columnB = this.getColumn(b);

    this.setColumn(a, columnB);
    this.setColumn(b, columnA);
  }

  public swapRows(a: number, b: number): void {
    swapRowsOf<Matrix4Key>(this, matrix4Keys, a, b);
  }

  public transpose(): void {
    transposeOf<Matrix4Key>(this, matrix4Keys);
  }

  public updateColumn(
    index: number,
    updater: (column: MutableVector4) => void
  ): void {
    const column = this.getColumn(index);

    updater(column);

    this.setColumn(index, column);
  }
}

class Matrix4 {
  public static readonly dimension = 4;

  public static fromArray(
    values: ArrayLike<number>,
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return Matrix4.fromZero(["setFromArray", values], ...invokes);
  }

  public static fromColumns(
    c0: Vector4,
    c1: Vector4,
    c2: Vector4,
    c3: Vector4,
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return Matrix4.fromSource(
      {
        v00: c0.x,
        v01: c0.y,
        v02: c0.z,
        v03: c0.w,
        v10: c1.x,
        v11: c1.y,
        v12: c1.z,
        v13: c1.w,
        v20: c2.x,
        v21: c2.y,
        v22: c2.z,
        v23: c2.w,
        v30: c3.x,
        v31: c3.y,
        v32: c3.z,
        v33: c3.w,
      },
      ...invokes
    );
  }

  public static fromIdentity(
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return invokeOnObject(new MutableMatrix4(Matrix4.identity), invokes);
  }

  public static fromSource(
    source: Matrix4,
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return invokeOnObject(new MutableMatrix4(source), invokes);
  }

  public static fromValue(
    value: number,
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return Matrix4.fromIdentity(["scale", value], ...invokes);
  }

  public static fromZero(
    ...invokes: InvokeOf<MutableMatrix4>[]
  ): MutableMatrix4 {
    return invokeOnObject(new MutableMatrix4(Matrix4.zero), invokes);
  }

  public static toArray(matrix: Matrix4): number[] {
    return toArrayOf<Matrix4Key>(matrix, matrix4Keys);
  }

  public static readonly identity: Matrix4 = {
    v00: 1,
    v01: 0,
    v02: 0,
    v03: 0,
    v10: 0,
    v11: 1,
    v12: 0,
    v13: 0,
    v20: 0,
    v21: 0,
    v22: 1,
    v23: 0,
    v30: 0,
    v31: 0,
    v32: 0,
    v33: 1,
  };

  public static readonly zero: Matrix4 = {
    v00: 0,
    v01: 0,
    v02: 0,
    v03: 0,
    v10: 0,
    v11: 0,
    v12: 0,
    v13: 0,
    v20: 0,
    v21: 0,
    v22: 0,
    v23: 0,
    v30: 0,
    v31: 0,
    v32: 0,
    v33: 0,
  };
}

export {
  type MutableSquareMatrix,
  type SquareMatrix,
  Matrix2,
  Matrix3,
  Matrix4,
  MutableMatrix2,
  MutableMatrix3,
  MutableMatrix4,
};
