// Small 2D vector value. Every operation returns a new vector.
export class Vector2 {
  constructor(
    public readonly x = 0,
    public readonly y = 0
  ) {}

  static zero(): Vector2 {
    return new Vector2(0, 0);
  }

  static from(point: { x: number; y: number }): Vector2 {
    return new Vector2(point.x, point.y);
  }

  add(other: Vector2): Vector2 {
    return new Vector2(this.x + other.x, this.y + other.y);
  }

  subtract(other: Vector2): Vector2 {
    return new Vector2(this.x - other.x, this.y - other.y);
  }

  multiply(scalar: number): Vector2 {
    return new Vector2(this.x * scalar, this.y * scalar);
  }

  // Caller guarantees scalar !== 0
  divide(scalar: number): Vector2 {
    return new Vector2(this.x / scalar, this.y / scalar);
  }

  // z component of the 3D cross product
  cross(other: Vector2): number {
    return this.x * other.y - this.y * other.x;
  }

  magnitude(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y);
  }

  magnitudeSquared(): number {
    return this.x * this.x + this.y * this.y;
  }

  // Unit vector. An exact zero vector comes back unchanged instead of (NaN, NaN),
  // so coincident bodies contribute nothing.
  normalized(): Vector2 {
    const mag = this.magnitude();
    return mag === 0 ? this.clone() : this.divide(mag);
  }

  distanceTo(other: Vector2): number {
    return this.subtract(other).magnitude();
  }

  isFinite(): boolean {
    return Number.isFinite(this.x) && Number.isFinite(this.y);
  }

  clone(): Vector2 {
    return new Vector2(this.x, this.y);
  }
}
