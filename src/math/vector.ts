import { InvokeOf, invokeOnObject } from "../language/dynamic";
import { Quaternion } from "./quaternion";

interface Vector2 {
  readonly x: number;
  readonly y: number;
}

class MutableVector2 implements Vector2 {
  public x: number;
  public y: number;

  public constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  public getDot(rhs: Vector2): number {
    return this.x * rhs.x + this.y * rhs.y;
  }

  public scale(factor: number): void {
    this.x *= factor;
    this.y *= factor;
  }
}

class Vector2 {
  public static toArray(vector: Vector2): [number, number] {
    return [vector.x, vector.y];
  }
}

interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

class MutableVector3 implements Vector3 {
  public x: number;
  public y: number;
  public z: number;

  public constructor(x: number, y: number, z: number) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  public cross(rhs: Vector3): void {
    const { x: lx, y: ly, z: lz } = this;
    const { x: rx, y: ry, z: rz } = rhs;

    this.x = ly * rz - lz * ry;
    this.y = lz * rx - lx * rz;
    this.z = lx * ry - ly * rx;
  }

  public getDot(rhs: Vector3): number {
    return this.x * rhs.x + this.y * rhs.y + this.z * rhs.z;
  }

  public getNorm(): number {
    const { x, y, z } = this;

    return Math.sqrt(x * x + y * y + z * z);
  }

  public negate(): void {
    this.x = -this.x;
    this.y = -this.y;
    this.z = -this.z;
  }

  public normalize(): boolean {
    const norm = this.getNorm();

    if (norm === 0) {
      return false;
    }

    this.scale(1 / norm);

    return true;
  }

  /**
   * Rotate vector by given unit quaternion, i.e. compute q * v * q^-1.
   */
  public rotate(quaternion: Quaternion): void {
    const q = Quaternion.fromSource(quaternion);
    const q1 = Quaternion.fromSource(quaternion);

    q1.invert();
    q.multiply({ scalar: 0, vector: this });
    q.multiply(q1);

    this.set(q.vector);
  }

  public scale(factor: number): void {
    this.x *= factor;
    this.y *= factor;
    this.z *= factor;
  }

  public set(source: Vector3): void {
    this.x = source.x;
    this.y = source.y;
    this.z = source.z;
  }

  public setFromXYZ(x: number, y: number, z: number): void {
    this.x = x;
    this.y = y;
    this.z = z;
  }
}

class Vector3 {
  public static fromSource(
    source: Vector3,
    ...invokes: InvokeOf<MutableVector3>[]
  ): MutableVector3 {
    const { x, y, z } = source;

    return invokeOnObject(new MutableVector3(x, y, z), invokes);
  }

  public static toArray(vector: Vector3): [number, number, number] {
    return [vector.x, vector.y, vector.z];
  }
}

interface Vector4 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly w: number;
}

class MutableVector4 implements Vector4 {
  public x: number;
  public y: number;
  public z: number;
  public w: number;

  public constructor(x: number, y: number, z: number, w: number) {
    this.x = x;
    this.y = y;
    this.z = z;
    this.w = w;
  }

  public getDot(rhs: Vector4): number {
    return this.x * rhs.x + this.y * rhs.y + this.z * rhs.z + this.w * rhs.w;
  }

  public scale(factor: number): void {
    this.x *= factor;
    this.y *= factor;
    this.z *= factor;
    this.w *= factor;
  }

  public sub(rhs: Vector4): void {
    this.x -= rhs.x;
    this.y -= rhs.y;
    this.z -= rhs.z;
    this.w -= rhs.w;
  }
}

class Vector4 {
  public static fromSource(
    source: Vector4,
    ...invokes: InvokeOf<MutableVector4>[]
  ): MutableVector4 {
    const { x, y, z, w } = source;

    return invokeOnObject(new MutableVector4(x, y, z, w), invokes);
  }

  public static toArray(vector: Vector4): [number, number, number, number] {
    return [vector.x, vector.y, vector.z, vector.w];
  }
}

export {
  MutableVector2,
  MutableVector3,
  MutableVector4,
  Vector2,
  Vector3,
  Vector4,
};
