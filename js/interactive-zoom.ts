/**
 * Interactive zoom for figure windows, loaded on demand from the
 * "Interactive Zoom" menu. Scroll to zoom about the cursor, drag to pan,
 * double-click to reset.
 */

import type { Figure } from "./figure-data";

export type ZoomState = { zoom: number; panX: number; panY: number };

export const MIN_ZOOM = 0.5;
export const MAX_ZOOM = 10;
export const DEFAULT_ZOOM_STATE: ZoomState = { zoom: 1, panX: 0, panY: 0 };

/** Zoom by one wheel step, keeping the point under the cursor fixed. */
export function zoomAt(state: ZoomState, mouseX: number, mouseY: number, deltaY: number): ZoomState {
  const delta = deltaY > 0 ? 0.9 : 1.1;
  const zoom = Math.min(Math.max(state.zoom * delta, MIN_ZOOM), MAX_ZOOM);
  const scale = zoom / state.zoom;
  return {
    zoom,
    panX: mouseX - scale * (mouseX - state.panX),
    panY: mouseY - scale * (mouseY - state.panY),
  };
}

export function panBy(start: ZoomState, dx: number, dy: number): ZoomState {
  return { ...start, panX: start.panX + dx, panY: start.panY + dy };
}

/**
 * Map a point on the canvas back to image pixel coordinates. `pixelScale` is
 * canvas pixels per image pixel at zoom 1.
 */
export function toImageCoords(state: ZoomState, canvasX: number, canvasY: number, pixelScale: number): { x: number; y: number } {
  return {
    x: (canvasX - state.panX) / state.zoom / pixelScale,
    y: (canvasY - state.panY) / state.zoom / pixelScale,
  };
}

export function isZoomed(state: ZoomState): boolean {
  return state.zoom !== 1 || state.panX !== 0 || state.panY !== 0;
}

export function getZoomState(figure: Figure, imageId: string): ZoomState {
  return figure.zoom?.[imageId] ?? DEFAULT_ZOOM_STATE;
}

/** Turn interactive zoom on for a figure. Existing zoom states are kept. */
export function activateInteractiveZoom(figure: Figure): void {
  if (!figure.zoom) figure.zoom = {};
}

export function setZoomState(figure: Figure, imageId: string, state: ZoomState): void {
  if (!figure.zoom) return;
  figure.zoom[imageId] = state;
}

export function resetZoom(figure: Figure): void {
  if (figure.zoom) figure.zoom = {};
}
