/**
 * Figure windows: the registry of open figures, the routine that opens and
 * decorates one, and dispatch of its menu actions.
 */

import { FIGURE_COLOR, INTERACTIVE_ZOOM_LABEL, getChannelToggles, getMessage, imageToolsMenuLabel } from "./figure-layout";
import { createChannelControl, resetChannelControls, toggleChannel } from "./channels";
import { createFigureUserData } from "./figure-data";
import type { ApplicationState, Figure, FigureImage, FigureMenu, FigureProperties, MenuAction } from "./figure-data";
import { imageToolNames } from "./image-tools";
import type { ImageToolRegistry } from "./image-tools";

// ============================================================================
// Registry
// ============================================================================
type Listener = () => void;

function applyProperties(figure: Figure, properties: FigureProperties): void {
  if (properties.name !== undefined) figure.name = properties.name;
  if (properties.visible !== undefined) figure.visible = properties.visible;
  if (properties.toolbar !== undefined) figure.toolbar = properties.toolbar;
  if (properties.position !== undefined) figure.position = [...properties.position];
}

function checkImage(image: FigureImage): void {
  if (image.channels !== 1 && image.channels !== 3) {
    throw new Error(`Image '${image.id}' has ${image.channels} channels; expected 1 or 3.`);
  }
  const expected = image.width * image.height * image.channels;
  if (image.data.length !== expected) {
    throw new Error(`Image '${image.id}' holds ${image.data.length} values; expected ${expected} for ${image.width}x${image.height}x${image.channels}.`);
  }
}

export class FigureRegistry {
  private readonly figures = new Map<number, Figure>();
  private readonly listeners = new Set<Listener>();
  private currentNumber: number | undefined;

  /**
   * Return figure `number`, creating it if needed, and make it current.
   * `setup` runs before listeners hear of the figure.
   */
  figure(number?: number, properties?: FigureProperties, setup?: (figure: Figure) => void): Figure {
    if (number !== undefined && (!Number.isInteger(number) || number < 1)) {
      throw new Error(`Figure number must be a positive integer, got ${number}.`);
    }
    const n = number ?? this.nextFreeNumber();
    let figure = this.figures.get(n);
    if (!figure) {
      figure = {
        number: n,
        name: "",
        visible: true,
        toolbar: "auto",
        position: null,
        color: null,
        userData: null,
        menus: [],
        controls: [],
        images: [],
        zoom: null,
      };
      this.figures.set(n, figure);
    }
    if (properties) applyProperties(figure, properties);
    setup?.(figure);
    this.currentNumber = n;
    this.changed();
    return figure;
  }

  current(): Figure | undefined {
    return this.currentNumber === undefined ? undefined : this.figures.get(this.currentNumber);
  }

  get(number: number): Figure | undefined {
    return this.figures.get(number);
  }

  list(): Figure[] {
    return [...this.figures.values()].sort((a, b) => a.number - b.number);
  }

  /** Close a figure and drop its user data. Returns false if it was not open. */
  close(number: number): boolean {
    const figure = this.figures.get(number);
    if (!figure) return false;
    figure.userData = null;
    this.figures.delete(number);
    if (this.currentNumber === number) {
      const remaining = this.list();
      this.currentNumber = remaining.length > 0 ? remaining[remaining.length - 1].number : undefined;
    }
    this.changed();
    return true;
  }

  /** Replace the images a figure shows. Channel boxes start over checked. */
  setImages(number: number, images: FigureImage[]): void {
    const figure = this.figures.get(number);
    if (!figure) throw new Error(`Figure ${number} is not open.`);
    images.forEach(checkImage);
    figure.images = images;
    resetChannelControls(figure);
    if (figure.zoom) figure.zoom = {};
    this.changed();
  }

  /** Apply a mutation to an open figure and notify listeners. */
  update(number: number, fn: (figure: Figure) => void): void {
    const figure = this.figures.get(number);
    if (!figure) throw new Error(`Figure ${number} is not open.`);
    fn(figure);
    this.changed();
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  changed(): void {
    this.listeners.forEach((listener) => listener());
  }

  private nextFreeNumber(): number {
    let n = 1;
    while (this.figures.has(n)) n++;
    return n;
  }
}

// ============================================================================
// Opening and decorating
// ============================================================================
export interface FigureRequest {
  /** Application state. Without it the figure gets only the tag and colour. */
  state?: ApplicationState;
  number?: number;
  properties?: FigureProperties;
  application?: string;
}

/** A request naming only an existing figure number refers to it without decorating. */
export function isReferenceOnly(request: FigureRequest): boolean {
  return request.number !== undefined && request.properties === undefined;
}

export function buildFigureMenus(state: ApplicationState, application: string): FigureMenu[] {
  const tools: FigureMenu[] = imageToolNames(state.current.imageToolsFilenames).map((tool) => ({
    label: tool,
    action: { kind: "image-tool", tool },
    children: [],
  }));
  return [
    { label: INTERACTIVE_ZOOM_LABEL, action: { kind: "interactive-zoom" }, children: [] },
    { label: imageToolsMenuLabel(application), children: tools },
  ];
}

/**
 * Add menus, the figure toolbar and the channel checkboxes. Replaces earlier
 * decorations; hidden channels are restored before their boxes are replaced.
 */
export function decorateFigure(figure: Figure, state: ApplicationState, application: string): void {
  for (const control of figure.controls) {
    if (control.value === 0) toggleChannel(figure, control.tag, 1);
  }
  figure.menus = buildFigureMenus(state, application);
  figure.toolbar = "figure";
  figure.controls = getChannelToggles().map((spec) => createChannelControl(spec, state.current.fontSize));
}

/**
 * Open (or refer to) a figure window and tag it with the application's user
 * data. With application state, and unless the request is reference-only, the
 * window also gets its menus and channel checkboxes.
 */
export function openFigure(registry: FigureRegistry, request: FigureRequest = {}): Figure {
  const userData = createFigureUserData(request.state, request.application);
  const { state } = request;
  return registry.figure(request.number, request.properties, (figure) => {
    if (state && !isReferenceOnly(request)) decorateFigure(figure, state, userData.application);
    figure.userData = userData;
    figure.color = [...FIGURE_COLOR];
  });
}

// ============================================================================
// Menu actions
// ============================================================================
export type InteractiveZoomModule = typeof import("./interactive-zoom");
export type InteractiveZoomLoader = () => Promise<InteractiveZoomModule>;

export interface DispatchEnv {
  tools: ImageToolRegistry;
  showMessage: (message: string) => void;
  loadInteractiveZoom?: InteractiveZoomLoader;
  /** Called for tools with no front-end implementation instead of failing. */
  forwardTool?: (name: string) => void;
}

const loadInteractiveZoomModule: InteractiveZoomLoader = () => import("./interactive-zoom");

export async function dispatchMenuAction(
  registry: FigureRegistry,
  figure: Figure,
  action: MenuAction,
  env: DispatchEnv,
): Promise<void> {
  if (action.kind === "interactive-zoom") {
    try {
      const zoom = await (env.loadInteractiveZoom ?? loadInteractiveZoomModule)();
      zoom.activateInteractiveZoom(figure);
    } catch (e) {
      console.warn("Interactive zoom failed to load:", e);
      env.showMessage(getMessage("interactive_zoom_missing"));
    }
    registry.changed();
    return;
  }

  const state = figure.userData?.handles;
  if (!state) {
    throw new Error(`Figure ${figure.number} carries no application state; image tools need it.`);
  }
  if (!env.tools.has(action.tool) && env.forwardTool) {
    console.warn(`Image tool '${action.tool}' has no front-end implementation; forwarding to kernel.`);
    env.forwardTool(action.tool);
    return;
  }
  await env.tools.invoke(action.tool, state, figure);
  registry.changed();
}
