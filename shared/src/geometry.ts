import { Vec2 } from "./protocol.js";

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function circlesOverlap(a: Vec2, ar: number, b: Vec2, br: number): boolean {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const radSum = ar + br;
  return dx * dx + dy * dy <= radSum * radSum;
}

/**
 * Unit vector in the direction of (dx, dy). Zero-length and non-finite
 * input both yield the zero vector.
 */
export function normalize(dx: number, dy: number): Vec2 {
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) return { x: 0, y: 0 };
  const len = Math.hypot(dx, dy);
  if (len === 0 || !Number.isFinite(len)) return { x: 0, y: 0 };
  return { x: dx / len, y: dy / len };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp a circle's centre so the whole circle stays inside [0, width] × [0, height] */
export function clampToWorld(pos: Vec2, radius: number, width: number, height: number): Vec2 {
  return {
    x: clampAxis(pos.x, radius, width),
    y: clampAxis(pos.y, radius, height),
  };
}

function clampAxis(v: number, radius: number, size: number): number {
  if (!Number.isFinite(v)) return size / 2;
  // A circle wider than the world can only sit in the middle
  if (radius * 2 >= size) return size / 2;
  return clamp(v, radius, size - radius);
}
