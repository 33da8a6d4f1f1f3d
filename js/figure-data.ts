/**
 * Figure window data model.
 *
 * A figure is a plain mutable record owned by a FigureRegistry. Widgets read it
 * and re-render when the registry reports a change.
 */

import { APPLICATION_TAG } from "./figure-layout";
import type { ChannelTag, NormalizedPosition, Rgb } from "./figure-layout";
import type { ZoomState } from "./interactive-zoom";

// ============================================================================
// Application state and user data
// ============================================================================
export interface ApplicationState {
  pipeline: unknown;
  current: {
    imageToolsFilenames: string[];
    fontSize: number;
  };
}

export interface FigureUserData {
  application: string;
  handles?: ApplicationState;
}

export function createFigureUserData(state?: ApplicationState, application: string = APPLICATION_TAG): FigureUserData {
  return state ? { application, handles: state } : { application };
}

// ============================================================================
// Widget tree
// ============================================================================
export type MenuAction =
  | { kind: "interactive-zoom" }
  | { kind: "image-tool"; tool: string };

export interface FigureMenu {
  label: string;
  action?: MenuAction;
  children: FigureMenu[];
}

export interface ChannelControl {
  style: "checkbox";
  tag: ChannelTag;
  label: string;
  channel: number;
  units: "normalized";
  position: NormalizedPosition;
  fontSize: number;
  backgroundColor: Rgb;
  min: 0;
  max: 1;
  value: 0 | 1;
  /** Channel planes remembered when the box was last cleared, one per colour image. */
  userData: Float32Array[] | null;
}

/** Interleaved height x width x channels pixel buffer. */
export interface FigureImage {
  id: string;
  width: number;
  height: number;
  channels: number;
  data: Float32Array;
}

export type Toolbar = "auto" | "figure" | "none";

export interface FigureProperties {
  name?: string;
  visible?: boolean;
  toolbar?: Toolbar;
  position?: [number, number, number, number];
}

export interface Figure {
  number: number;
  name: string;
  visible: boolean;
  toolbar: Toolbar;
  position: [number, number, number, number] | null;
  color: Rgb | null;
  userData: FigureUserData | null;
  menus: FigureMenu[];
  controls: ChannelControl[];
  images: FigureImage[];
  /** Per-image zoom, keyed by image id. Null until interactive zoom is loaded. */
  zoom: Record<string, ZoomState> | null;
}
