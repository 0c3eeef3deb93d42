import type { Point } from "../core/types.js";

export interface ScreenSize {
  width: number;
  height: number;
}

export interface Camera {
  panX: number;
  panY: number;
  zoom: number;
}

export const DEFAULT_SCREEN: ScreenSize = { width: 1280, height: 720 };

export const identityCamera = (): Camera => ({ panX: 0, panY: 0, zoom: 1 });

/** Background-world point to screen space: scale about the screen center, then pan. */
export const worldToScreen = (point: Point, camera: Camera, screen: ScreenSize): [number, number] => {
  const cx = screen.width / 2;
  const cy = screen.height / 2;
  return [
    (point[0] - cx) * camera.zoom + cx + camera.panX,
    (point[1] - cy) * camera.zoom + cy + camera.panY,
  ];
};

export const screenToWorld = (point: Point, camera: Camera, screen: ScreenSize): [number, number] => {
  const cx = screen.width / 2;
  const cy = screen.height / 2;
  return [
    (point[0] - camera.panX - cx) / camera.zoom + cx,
    (point[1] - camera.panY - cy) / camera.zoom + cy,
  ];
};

export const pointInRect = (
  point: Point,
  rect: readonly [number, number, number, number]
): boolean => {
  const [x, y, w, h] = rect;
  return point[0] >= x && point[0] < x + w && point[1] >= y && point[1] < y + h;
};

/** Even-odd ray casting. */
export const pointInPolygon = (point: Point, polygon: readonly Point[]): boolean => {
  if (polygon.length < 3) {
    return false;
  }
  let inside = false;
  const [px, py] = point;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i, i += 1) {
    const [xi, yi] = polygon[i];
    const [xj, yj] = polygon[j];
    const crosses = yi > py !== yj > py && px < ((xj - xi) * (py - yi)) / (yj - yi) + xi;
    if (crosses) {
      inside = !inside;
    }
  }
  return inside;
};

export const distance = (a: Point, b: Point): number => Math.hypot(a[0] - b[0], a[1] - b[1]);

/**
 * Top-left position for a sprite placed by anchor words. Horizontal default is
 * center, vertical default is bottom.
 */
export const anchorPosition = (
  anchor: string | undefined,
  size: Point,
  screen: ScreenSize
): [number, number] => {
  const words = new Set((anchor ?? "").split(" ").filter((word) => word.length > 0));
  let x = (screen.width - size[0]) / 2;
  let y = screen.height - size[1];
  if (words.has("left")) {
    x = 0;
  } else if (words.has("right")) {
    x = screen.width - size[0];
  }
  if (words.has("top")) {
    y = 0;
  } else if (words.has("middle")) {
    y = (screen.height - size[1]) / 2;
  }
  return [Math.round(x), Math.round(y)];
};
