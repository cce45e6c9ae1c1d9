import type { Vector2 } from "./vocabulary/schemas/prelude";

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function multiply(v: Vector2, scalar: number): Vector2 {
  return { x: v.x * scalar, y: v.y * scalar };
}

export function divide(v: Vector2, scalar: number): Vector2 {
  if (scalar === 0) return { x: 0, y: 0 };
  return { x: v.x / scalar, y: v.y / scalar };
}

export function magnitude(v: Vector2): number {
  return Math.hypot(v.x, v.y);
}

export function normalize(v: Vector2): Vector2 {
  const mag = magnitude(v);
  if (mag === 0) return { x: 0, y: 0 };
  return divide(v, mag);
}

/**
 * Scale down to `max` if longer; never scales up
 */
export function limit(v: Vector2, max: number): Vector2 {
  const mag = magnitude(v);
  if (mag > max && mag > 0) {
    return multiply(v, max / mag);
  }
  return v;
}

/**
 * Squared Euclidean distance. Comparisons in the engine use this directly.
 */
export function distanceSquared(a: Vector2, b: Vector2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function distance(a: Vector2, b: Vector2): number {
  return Math.sqrt(distanceSquared(a, b));
}

/**
 * Unit vector at `angle` radians scaled to `length`
 */
export function fromAngle(angle: number, length: number): Vector2 {
  return { x: Math.cos(angle) * length, y: Math.sin(angle) * length };
}
