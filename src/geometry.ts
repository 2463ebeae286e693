import { EMPTY_OPAQUE, type OpaqueFields } from './xml.js';

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Position, size and routing data of a cell. Coordinates are relative to
 * the parent group's origin.
 */
export interface Geometry extends Rect {
  /** draw.io `relative="1"`: x/y are fractions along an edge (connector labels) */
  readonly relative: boolean;
  /** Connector waypoints */
  readonly points: readonly Point[];
  /** Free endpoint coordinates, used when the endpoint has no terminal */
  readonly sourcePoint: Point | null;
  readonly targetPoint: Point | null;
  /** Unknown mxGeometry attributes and child nodes */
  readonly extras: OpaqueFields;
}

export function createGeometry(rect: Partial<Rect> = {}): Geometry {
  return {
    x: rect.x ?? 0,
    y: rect.y ?? 0,
    width: rect.width ?? 0,
    height: rect.height ?? 0,
    relative: false,
    points: [],
    sourcePoint: null,
    targetPoint: null,
    extras: EMPTY_OPAQUE,
  };
}

export function translatePoint(p: Point, dx: number, dy: number): Point {
  return { x: p.x + dx, y: p.y + dy };
}

/** Shift the geometry and every point it carries */
export function translateGeometry(geometry: Geometry, dx: number, dy: number): Geometry {
  if (dx === 0 && dy === 0) return geometry;
  return {
    ...geometry,
    x: geometry.x + dx,
    y: geometry.y + dy,
    points: geometry.points.map((p) => translatePoint(p, dx, dy)),
    sourcePoint: geometry.sourcePoint ? translatePoint(geometry.sourcePoint, dx, dy) : null,
    targetPoint: geometry.targetPoint ? translatePoint(geometry.targetPoint, dx, dy) : null,
  };
}

/**
 * Shift only the routing points. A connector's x/y place its label along
 * the edge, so they do not move with it.
 */
export function translateRoute(geometry: Geometry, dx: number, dy: number): Geometry {
  if (dx === 0 && dy === 0) return geometry;
  return {
    ...geometry,
    points: geometry.points.map((p) => translatePoint(p, dx, dy)),
    sourcePoint: geometry.sourcePoint ? translatePoint(geometry.sourcePoint, dx, dy) : null,
    targetPoint: geometry.targetPoint ? translatePoint(geometry.targetPoint, dx, dy) : null,
  };
}

export function centerOf(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/** Smallest rect containing all given rects, or null for an empty list */
export function unionRects(rects: readonly Rect[]): Rect | null {
  if (rects.length === 0) return null;
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Bounding rect of a list of points (zero-sized for a single point) */
export function boundsOfPoints(points: readonly Point[]): Rect | null {
  return unionRects(points.map((p) => ({ x: p.x, y: p.y, width: 0, height: 0 })));
}
