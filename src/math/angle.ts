interface Angle {
  readonly radians: number;
}

class Angle {
  public static fromDegrees(degrees: number): Angle {
    return { radians: (degrees * Math.PI) / 180 };
  }

  public static fromRadians(radians: number): Angle {
    return { radians };
  }
}

export { Angle };
