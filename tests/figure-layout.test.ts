import { describe, it, expect } from "vitest";
import {
  APPLICATION_TAG,
  FIGURE_COLOR,
  INTERACTIVE_ZOOM_LABEL,
  getChannelToggles,
  getMessage,
  imageToolsMenuLabel,
  isChannelTag,
} from "../js/figure-layout";

describe("figure layout", () => {
  it("exposes the application tag, colour and zoom label", () => {
    expect(APPLICATION_TAG).toBe("CellProfiler");
    expect(FIGURE_COLOR).toEqual([0.7, 0.7, 0.9]);
    expect(INTERACTIVE_ZOOM_LABEL).toBe("Interactive Zoom");
  });

  it("lists R, G and B toggles left to right along the bottom", () => {
    const toggles = getChannelToggles();
    expect(toggles.map((t) => t.tag)).toEqual(["ToggleColorR", "ToggleColorG", "ToggleColorB"]);
    expect(toggles.map((t) => t.channel)).toEqual([0, 1, 2]);
    expect(toggles[0].position).toEqual([0.6, 0.02, 0.06, 0.04]);
    expect(toggles[1].position).toEqual([0.66, 0.02, 0.06, 0.04]);
    expect(toggles[2].position).toEqual([0.72, 0.02, 0.06, 0.04]);
  });

  it("returns copies that callers can mutate", () => {
    getChannelToggles()[0].position[0] = 0.9;
    expect(getChannelToggles()[0].position[0]).toBe(0.6);
  });

  it("recognises channel tags", () => {
    expect(isChannelTag("ToggleColorR")).toBe(true);
    expect(isChannelTag("R")).toBe(false);
  });

  it("names the image tools menu after the application", () => {
    expect(imageToolsMenuLabel("CellProfiler")).toBe("CellProfiler Image Tools");
    expect(imageToolsMenuLabel("")).toBe("Image Tools");
  });

  it("rejects unknown messages", () => {
    expect(getMessage("no_image_tools")).toBe("No image tools available");
    expect(() => getMessage("nope")).toThrow("Unknown message 'nope'. Supported messages: interactive_zoom_missing, no_image_tools.");
  });
});
