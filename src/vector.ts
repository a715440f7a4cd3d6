export type Vector2 = {
  readonly x: number;
  readonly y: number;
};

export const zero: Vector2 = { x: 0, y: 0 };

export function vec(x: number, y: number): Vector2 {
  return { x, y };
}

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vector2, factor: number): Vector2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function rotate(v: Vector2, angle: number): Vector2 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
}

export function length(v: Vector2): number {
  return Math.hypot(v.x, v.y);
}

// unit vector pointing along `angle` (0 = +x, screen y grows downwards)
export function fromAngle(angle: number, magnitude = 1): Vector2 {
  return { x: Math.cos(angle) * magnitude, y: Math.sin(angle) * magnitude };
}

export function clampLength(v: Vector2, max: number): Vector2 {
  const len = length(v);
  if (len <= max || len === 0) return v;
  return scale(v, max / len);
}
