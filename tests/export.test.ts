import { describe, it, expect } from "vitest";
import { toggleChannel } from "../js/channels";
import { buildExportArchive, buildExportMetadata } from "../js/export";
import { makeRgbImage, openDecorated } from "./helpers";

const EXPORTED_AT = new Date("2024-03-01T12:00:00.000Z");

describe("figure export", () => {
  it("describes the figure and its channel visibility", () => {
    const { figure } = openDecorated([makeRgbImage("a"), makeRgbImage("b")]);
    toggleChannel(figure, "ToggleColorG", 0);
    expect(buildExportMetadata(figure, EXPORTED_AT)).toEqual({
      metadata_version: "1.0",
      figure: 1,
      name: "Nuclei",
      application: "CellProfiler",
      n_images: 2,
      channels: { R: true, G: false, B: true },
      exported_at: "2024-03-01T12:00:00.000Z",
    });
  });

  it("archives one PNG per image with metadata", async () => {
    const { figure } = openDecorated([makeRgbImage("a"), makeRgbImage("b")]);
    const pngs = [new Uint8Array([1, 2, 3]), new Uint8Array([4, 5])];
    const zip = buildExportArchive(figure, pngs, EXPORTED_AT);

    expect(Object.keys(zip.files).sort()).toEqual(["image_0.png", "image_1.png", "metadata.json"]);
    const second = await zip.file("image_1.png")?.async("uint8array");
    expect(Array.from(second ?? [])).toEqual([4, 5]);
    const metadata = JSON.parse((await zip.file("metadata.json")?.async("string")) ?? "{}");
    expect(metadata.n_images).toBe(2);
    expect(metadata.channels).toEqual({ R: true, G: true, B: true });
  });
});
