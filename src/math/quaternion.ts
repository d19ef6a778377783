import { InvokeOf, invokeOnObject } from "../language/dynamic";
import { Angle } from "./angle";
import { MutableVector3, Vector3 } from "./vector";

/**
 * Rotation quaternion, where `scalar` holds the real part (usually named "w")
 * and `vector` holds the imaginary parts (x, y, z).
 */
interface Quaternion {
  readonly scalar: number;
  readonly vector: Vector3;
}

class MutableQuaternion implements Quaternion {
  public scalar: number;
  public vector: MutableVector3;

  public constructor(scalar: number, vector: MutableVector3) {
    this.scalar = scalar;
    this.vector = vector;
  }

  public conjugate(): void {
    this.vector.negate();
  }

  public getNormSquare(): number {
    const { scalar, vector } = this;

    return scalar * scalar + vector.getDot(vector);
  }

  public invert(): boolean {
    const normSquare = this.getNormSquare();

    if (normSquare === 0) {
      return false;
    }

    const factor = 1 / normSquare;

    this.conjugate();
    this.scalar *= factor;
    this.vector.scale(factor);

    return true;
  }

  /**
   * Hamilton product, this = this * rhs.
   */
  public multiply(rhs: Quaternion): void {
    const { scalar: s1, vector: v1 } = this;
    const { scalar: s2, vector: v2 } = rhs;
    const { x: x1, y: y1, z: z1 } = v1;
    const { x: x2, y: y2, z: z2 } = v2;

    this.scalar = s1 * s2 - x1 * x2 - y1 * y2 - z1 * z2;
    this.vector.x = s1 * x2 + x1 * s2 + y1 * z2 - z1 * y2;
    this.vector.y = s1 * y2 - x1 * z2 + y1 * s2 + z1 * x2;
    this.vector.z = s1 * z2 + x1 * y2 - y1 * x2 + z1 * s2;
  }

  public setFromAxisAngle(axis: Vector3, angle: Angle): void {
    const halfAngle = angle.radians * 0.5;

    this.scalar = Math.cos(halfAngle);
    this.vector.set(axis);
    this.vector.scale(Math.sin(halfAngle));
  }

  public setFromWXYZ(w: number, x: number, y: number, z: number): void {
    this.scalar = w;
    this.vector.setFromXYZ(x, y, z);
  }
}

class Quaternion {
  public static fromIdentity(
    ...invokes: InvokeOf<MutableQuaternion>[]
  ): MutableQuaternion {
    return Quaternion.fromSource(Quaternion.identity, ...invokes);
  }

  public static fromSource(
    source: Quaternion,
    ...invokes: InvokeOf<MutableQuaternion>[]
  ): MutableQuaternion {
    const { scalar, vector } = source;

    return invokeOnObject(
      new MutableQuaternion(scalar, Vector3.fromSource(vector)),
      invokes
    );
  }

  public static readonly identity: Quaternion = {
    scalar: 1,
    vector: { x: 0, y: 0, z: 0 },
  };
}

export { MutableQuaternion, Quaternion };
