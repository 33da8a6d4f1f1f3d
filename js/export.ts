import JSZip from "jszip";
import { channelVisibility } from "./channels";
import type { Figure } from "./figure-data";
import { downloadBlob } from "./format";

export type ExportMetadata = {
  metadata_version: string;
  figure: number;
  name: string;
  application: string | null;
  n_images: number;
  channels: Record<string, boolean>;
  exported_at: string;
};

export function buildExportMetadata(figure: Figure, exportedAt: Date): ExportMetadata {
  return {
    metadata_version: "1.0",
    figure: figure.number,
    name: figure.name,
    application: figure.userData?.application ?? null,
    n_images: figure.images.length,
    channels: channelVisibility(figure),
    exported_at: exportedAt.toISOString(),
  };
}

/** ZIP holding image_<i>.png for every rendered image plus metadata.json. */
export function buildExportArchive(figure: Figure, pngs: (Blob | Uint8Array)[], exportedAt: Date): JSZip {
  const zip = new JSZip();
  pngs.forEach((png, i) => zip.file(`image_${i}.png`, png));
  zip.file("metadata.json", JSON.stringify(buildExportMetadata(figure, exportedAt), null, 2));
  return zip;
}

function canvasToBlob(canvas: HTMLCanvasElement): Promise<Blob> {
  return new Promise((resolve, reject) => {
    canvas.toBlob((blob) => {
      if (blob) resolve(blob);
      else reject(new Error("Canvas could not be encoded as PNG."));
    }, "image/png");
  });
}

/** Save a figure's canvases: one image as PNG, several as a ZIP. */
export async function exportFigure(figure: Figure, canvases: HTMLCanvasElement[]): Promise<void> {
  if (canvases.length === 0) return;
  if (canvases.length === 1) {
    downloadBlob(await canvasToBlob(canvases[0]), `figure${figure.number}.png`);
    return;
  }
  const now = new Date();
  const pngs = await Promise.all(canvases.map(canvasToBlob));
  const zipBlob = await buildExportArchive(figure, pngs, now).generateAsync({ type: "blob" });
  const timestamp = now.toISOString().replace(/[:.]/g, "-").slice(0, 19);
  downloadBlob(zipBlob, `figure${figure.number}_${timestamp}.zip`);
}
