import { FigureRegistry, openFigure } from "../js/figure-registry";
import type { ApplicationState, Figure, FigureImage } from "../js/figure-data";

export function makeState(tools: string[] = ["Image tools", "ShowDataOnImage", "MeasureDistance"], fontSize = 11): ApplicationState {
  return { pipeline: { modules: [] }, current: { imageToolsFilenames: tools, fontSize } };
}

export function makeImage(id: string, width: number, height: number, channels: number, values: number[]): FigureImage {
  return { id, width, height, channels, data: new Float32Array(values) };
}

/** 2x1 colour image: pixel 0 = (0.25, 0.5, 0.75), pixel 1 = (1, 0.125, 0). */
export function makeRgbImage(id = "rgb"): FigureImage {
  return makeImage(id, 2, 1, 3, [0.25, 0.5, 0.75, 1, 0.125, 0]);
}

export function openDecorated(images: FigureImage[] = [makeRgbImage()], state: ApplicationState = makeState()): {
  registry: FigureRegistry;
  figure: Figure;
  state: ApplicationState;
} {
  const registry = new FigureRegistry();
  const figure = openFigure(registry, { state, properties: { name: "Nuclei" } });
  registry.setImages(figure.number, images);
  return { registry, figure, state };
}
