export { type InvokeOf, invokeOnObject } from "./language/dynamic";
export { Angle } from "./math/angle";
export {
  type MutableSquareMatrix,
  type SquareMatrix,
  Matrix2,
  Matrix3,
  Matrix4,
  MutableMatrix2,
  MutableMatrix3,
  MutableMatrix4,
} from "./math/matrix";
export { frustum, ortho, perspective } from "./math/projection";
export { MutableQuaternion, Quaternion } from "./math/quaternion";
export { epsilon, isFuzzyEqual, isFuzzyZero } from "./math/scalar";
export {
  MutableVector2,
  MutableVector3,
  MutableVector4,
  Vector2,
  Vector3,
  Vector4,
} from "./math/vector";
