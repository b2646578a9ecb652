export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  x: number; // inclusive left
  y: number; // inclusive bottom
  width: number;
  height: number;
}

export function rectAt(position: Vec2, width: number, height: number): Rect {
  return { x: position.x, y: position.y, width, height };
}

/**
 * Half-open overlap test: rectangles sharing only an edge do not overlap.
 */
export function overlaps(a: Rect, b: Rect): boolean {
  return b.x + b.width > a.x && b.x < a.x + a.width && b.y + b.height > a.y && b.y < a.y + a.height;
}

export function overlapsAny(rect: Rect, others: readonly Rect[]): boolean {
  return others.some((o) => overlaps(rect, o));
}
