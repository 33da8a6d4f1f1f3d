import layoutJson from "./figure-layout.json";

export type Rgb = [number, number, number];
export type NormalizedPosition = [number, number, number, number];

export const CHANNEL_TAGS = ["ToggleColorR", "ToggleColorG", "ToggleColorB"] as const;
export type ChannelTag = (typeof CHANNEL_TAGS)[number];

type ChannelToggleConfig = {
  tag: string;
  label: string;
  channel: number;
  position: number[];
};

type FigureLayout = {
  application: string;
  figure_color: number[];
  menus: {
    interactive_zoom: string;
    image_tools: string;
  };
  channel_toggles: ChannelToggleConfig[];
  messages: Record<string, string>;
};

export type ChannelToggleSpec = {
  tag: ChannelTag;
  label: string;
  channel: number;
  position: NormalizedPosition;
};

const LAYOUT = layoutJson as FigureLayout;

export function isChannelTag(value: string): value is ChannelTag {
  return CHANNEL_TAGS.some((tag) => tag === value);
}

function toRgb(values: number[]): Rgb {
  if (values.length !== 3) throw new Error(`Expected an RGB triple, got ${values.length} values.`);
  return [values[0], values[1], values[2]];
}

function toPosition(values: number[]): NormalizedPosition {
  if (values.length !== 4) throw new Error(`Expected [x, y, width, height], got ${values.length} values.`);
  return [values[0], values[1], values[2], values[3]];
}

function toToggleSpec(cfg: ChannelToggleConfig): ChannelToggleSpec {
  if (!isChannelTag(cfg.tag)) {
    const supported = CHANNEL_TAGS.map((t) => `"${t}"`).join(", ");
    throw new Error(`Unknown channel toggle tag '${cfg.tag}'. Supported values: ${supported}.`);
  }
  return { tag: cfg.tag, label: cfg.label, channel: cfg.channel, position: toPosition(cfg.position) };
}

export const APPLICATION_TAG = LAYOUT.application;
export const FIGURE_COLOR: Rgb = toRgb(LAYOUT.figure_color);
export const INTERACTIVE_ZOOM_LABEL = LAYOUT.menus.interactive_zoom;

const CHANNEL_TOGGLES: ChannelToggleSpec[] = LAYOUT.channel_toggles.map(toToggleSpec);

/** Label of the image tools menu, e.g. "CellProfiler Image Tools". */
export function imageToolsMenuLabel(application: string): string {
  return LAYOUT.menus.image_tools.replace("{application}", application).trim();
}

export function getChannelToggles(): ChannelToggleSpec[] {
  return CHANNEL_TOGGLES.map((spec) => ({ ...spec, position: [...spec.position] }));
}

export function getMessage(id: string): string {
  const message = LAYOUT.messages[id];
  if (message === undefined) {
    const supported = Object.keys(LAYOUT.messages).sort().join(", ");
    throw new Error(`Unknown message '${id}'. Supported messages: ${supported}.`);
  }
  return message;
}
