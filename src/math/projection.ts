import { Angle } from "./angle";
import { Matrix4, MutableMatrix4 } from "./matrix";

/*
 ** Create new perspective projection matrix from a full vertical field of view
 ** expressed in degrees.
 ** From: https://www.khronos.org/registry/OpenGL-Refpages/gl2.1/xhtml/gluPerspective.xml
 */
const perspective = (
  fovyDegrees: number,
  aspectRatio: number,
  zNear: number,
  zFar: number
): MutableMatrix4 => {
  const yMax = zNear * Math.tan(Angle.fromDegrees(fovyDegrees / 2).radians);
  const xMax = yMax * aspectRatio;

  return frustum(-xMax, xMax, -yMax, yMax, zNear, zFar);
};

/*
 ** Create new perspective projection matrix from clipping planes.
 ** From: https://www.khronos.org/registry/OpenGL-Refpages/gl2.1/xhtml/glFrustum.xml
 */
const frustum = (
  xMin: number,
  xMax: number,
  yMin: number,
  yMax: number,
  zNear: number,
  zFar: number
): MutableMatrix4 => {
  const dx = xMax - xMin;
  const dy = yMax - yMin;
  const dz = zFar - zNear;

  return Matrix4.fromSource({
    v00: (2 * zNear) / dx,
    v01: 0,
    v02: 0,
    v03: 0,
    v10: 0,
    v11: (2 * zNear) / dy,
    v12: 0,
    v13: 0,
    v20: (xMax + xMin) / dx,
    v21: (yMax + yMin) / dy,
    v22: -(zFar + zNear) / dz,
    v23: -1,
    v30: 0,
    v31: 0,
    v32: -(2 * zFar * zNear) / dz,
    v33: 0,
  });
};

/*
 ** Create new orthographic projection matrix.
 ** From: https://www.khronos.org/registry/OpenGL-Refpages/gl2.1/xhtml/glOrtho.xml
 */
const ortho = (
  xMin: number,
  xMax: number,
  yMin: number,
  yMax: number,
  zNear: number,
  zFar: number
): MutableMatrix4 => {
  const dx = xMax - xMin;
  const dy = yMax - yMin;
  const dz = zFar - zNear;

  return Matrix4.fromSource({
    v00: 2 / dx,
    v01: 0,
    v02: 0,
    v03: 0,
    v10: 0,
    v11: 2 / dy,
    v12: 0,
    v13: 0,
    v20: 0,
    v21: 0,
    v22: -2 / dz,
    v23: 0,
    v30: -(xMax + xMin) / dx,
    v31: -(yMax + yMin) / dy,
    v32: -(zFar + zNear) / dz,
    v33: 1,
  });
};

export { frustum, ortho, perspective };
