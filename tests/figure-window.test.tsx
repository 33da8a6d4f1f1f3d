/**
 * FigureWindow Component Tests
 * Menus, channel checkboxes and the message box
 */

import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent, waitFor } from "@testing-library/react";
import { FigureWindow } from "../js/figure/index";
import { FigureRegistry, openFigure } from "../js/figure-registry";
import { getMessage } from "../js/figure-layout";
import { ImageToolRegistry } from "../js/image-tools";
import { makeImage, makeState, openDecorated } from "./helpers";

describe("FigureWindow", () => {
  it("renders the title, menus and checked channel boxes", () => {
    const { registry, figure } = openDecorated();
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    expect(screen.getByText("Figure 1: Nuclei")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Interactive Zoom" })).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "CellProfiler Image Tools" })).toBeInTheDocument();
    for (const label of ["R", "G", "B"]) {
      expect(screen.getByRole("checkbox", { name: label })).toBeChecked();
    }
    expect(screen.getByTestId("canvas-rgb")).toBeInTheDocument();
  });

  it("hides a colour channel when its box is cleared and restores it when checked", () => {
    const { registry, figure } = openDecorated();
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    fireEvent.click(screen.getByRole("checkbox", { name: "R" }));
    expect(screen.getByRole("checkbox", { name: "R" })).not.toBeChecked();
    expect(Array.from(figure.images[0].data)).toEqual([0, 0.5, 0.75, 0, 0.125, 0]);

    fireEvent.click(screen.getByRole("checkbox", { name: "R" }));
    expect(screen.getByRole("checkbox", { name: "R" })).toBeChecked();
    expect(Array.from(figure.images[0].data)).toEqual([0.25, 0.5, 0.75, 1, 0.125, 0]);
  });

  it("runs an image tool from the tools menu", async () => {
    const { registry, figure, state } = openDecorated();
    const tool = vi.fn();
    const tools = new ImageToolRegistry().register("MeasureDistance", tool);
    render(<FigureWindow registry={registry} figureNumber={figure.number} tools={tools} />);

    fireEvent.click(screen.getByRole("button", { name: "CellProfiler Image Tools" }));
    expect(screen.getByRole("menuitem", { name: "ShowDataOnImage" })).toBeInTheDocument();
    fireEvent.click(screen.getByRole("menuitem", { name: "MeasureDistance" }));

    await waitFor(() => expect(tool).toHaveBeenCalledWith(state, figure));
  });

  it("shows a disabled placeholder when there are no image tools", () => {
    const { registry, figure } = openDecorated(undefined, makeState(["Image tools"]));
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    fireEvent.click(screen.getByRole("button", { name: "CellProfiler Image Tools" }));
    expect(screen.getByRole("menuitem", { name: "No image tools available" })).toHaveAttribute("aria-disabled", "true");
  });

  it("reports a tool failure in the message box", async () => {
    const { registry, figure } = openDecorated();
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    fireEvent.click(screen.getByRole("button", { name: "CellProfiler Image Tools" }));
    fireEvent.click(screen.getByRole("menuitem", { name: "ShowDataOnImage" }));

    expect(await screen.findByText("Unknown image tool 'ShowDataOnImage'. Registered tools: none.")).toBeInTheDocument();
  });

  it("turns on interactive zoom", async () => {
    const { registry, figure } = openDecorated();
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    fireEvent.click(screen.getByRole("button", { name: "Interactive Zoom" }));
    expect(await screen.findByText("zoom on")).toBeInTheDocument();
    expect(figure.zoom).toEqual({});
  });

  it("shows a message box when interactive zoom cannot load", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { registry, figure } = openDecorated();
    const loadInteractiveZoom = () => Promise.reject(new Error("missing"));
    render(<FigureWindow registry={registry} figureNumber={figure.number} loadInteractiveZoom={loadInteractiveZoom} />);

    fireEvent.click(screen.getByRole("button", { name: "Interactive Zoom" }));
    expect(await screen.findByText(getMessage("interactive_zoom_missing"))).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "CellProfiler" })).toBeInTheDocument();

    fireEvent.click(screen.getByRole("button", { name: "OK" }));
    await waitFor(() => expect(screen.queryByText(getMessage("interactive_zoom_missing"))).not.toBeInTheDocument());
    expect(figure.zoom).toBeNull();
    warn.mockRestore();
  });

  it("renders a plain figure without menus or channel boxes", () => {
    const registry = new FigureRegistry();
    const figure = openFigure(registry);
    registry.setImages(figure.number, [makeImage("grey", 2, 1, 1, [1, 2])]);
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);

    expect(screen.getByText("Figure 1")).toBeInTheDocument();
    expect(screen.queryByRole("button", { name: "Interactive Zoom" })).not.toBeInTheDocument();
    expect(screen.queryByRole("checkbox")).not.toBeInTheDocument();
  });

  it("follows the registry when a figure closes", async () => {
    const { registry, figure } = openDecorated();
    render(<FigureWindow registry={registry} figureNumber={figure.number} />);
    registry.close(figure.number);
    expect(await screen.findByText("Figure 1 is not open.")).toBeInTheDocument();
  });
});
