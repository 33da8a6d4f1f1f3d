import type { FigureImage } from "./figure-data";

/** Convert anywidget DataView/ArrayBuffer to Uint8Array. */
export function extractBytes(dataView: DataView | ArrayBuffer | Uint8Array): Uint8Array {
  if (dataView instanceof Uint8Array) return dataView;
  if (dataView instanceof ArrayBuffer) return new Uint8Array(dataView);
  if (dataView && "buffer" in dataView) {
    return new Uint8Array(dataView.buffer, dataView.byteOffset, dataView.byteLength);
  }
  return new Uint8Array(0);
}

/** Extract Float32Array from anywidget DataView. Returns null if empty. */
export function extractFloat32(dataView: DataView | ArrayBuffer | Uint8Array): Float32Array | null {
  const bytes = extractBytes(dataView);
  if (bytes.length === 0) return null;
  // Float32Array views need 4-byte alignment
  const aligned = bytes.byteOffset % 4 === 0 ? bytes : bytes.slice();
  return new Float32Array(aligned.buffer, aligned.byteOffset, Math.floor(aligned.byteLength / 4));
}

/** Split a flat float buffer into `nImages` interleaved height x width x channels images. */
export function splitFrames(
  floats: Float32Array,
  nImages: number,
  width: number,
  height: number,
  channels: number,
): FigureImage[] {
  const perImage = width * height * channels;
  const expected = nImages * perImage;
  if (floats.length !== expected) {
    throw new Error(`Expected ${expected} floats for ${nImages} image(s) of ${width}x${height}x${channels}, got ${floats.length}.`);
  }
  const images: FigureImage[] = [];
  for (let i = 0; i < nImages; i++) {
    const start = i * perImage;
    images.push({
      id: `image-${i}`,
      width,
      height,
      channels,
      data: new Float32Array(floats.subarray(start, start + perImage)),
    });
  }
  return images;
}

/** Download a Blob as a file. */
export function downloadBlob(blob: Blob, filename: string): void {
  const link = document.createElement("a");
  link.download = filename;
  link.href = URL.createObjectURL(blob);
  link.click();
  URL.revokeObjectURL(link.href);
}

/** Format number with exponential notation for large/small values. */
export function formatNumber(val: number, decimals: number = 2): string {
  if (val === 0) return "0";
  if (Math.abs(val) >= 1000 || Math.abs(val) < 0.01) return val.toExponential(decimals);
  return val.toFixed(decimals);
}
