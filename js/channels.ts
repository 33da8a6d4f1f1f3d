/**
 * R/G/B channel toggles.
 *
 * Clearing a box remembers that channel of every colour image in the figure and
 * zeroes it. Checking the box again writes the remembered planes back.
 */

import { FIGURE_COLOR } from "./figure-layout";
import type { ChannelTag, ChannelToggleSpec } from "./figure-layout";
import type { ChannelControl, Figure, FigureImage } from "./figure-data";

function checkChannel(image: FigureImage, channel: number): void {
  if (!Number.isInteger(channel) || channel < 0 || channel >= image.channels) {
    throw new Error(`Channel ${channel} is out of range for image '${image.id}' with ${image.channels} channel(s).`);
  }
}

/** Copy one channel out of an interleaved image as a width*height plane. */
export function extractChannel(image: FigureImage, channel: number): Float32Array {
  checkChannel(image, channel);
  const plane = new Float32Array(image.width * image.height);
  for (let i = 0; i < plane.length; i++) {
    plane[i] = image.data[i * image.channels + channel];
  }
  return plane;
}

export function fillChannel(image: FigureImage, channel: number, value: number): void {
  checkChannel(image, channel);
  const n = image.width * image.height;
  for (let i = 0; i < n; i++) image.data[i * image.channels + channel] = value;
}

export function writeChannel(image: FigureImage, channel: number, plane: Float32Array): void {
  checkChannel(image, channel);
  const n = image.width * image.height;
  if (plane.length !== n) {
    throw new Error(`Plane of ${plane.length} values does not fit image '${image.id}' (${image.width}x${image.height}).`);
  }
  for (let i = 0; i < n; i++) image.data[i * image.channels + channel] = plane[i];
}

export function isColorImage(image: FigureImage): boolean {
  return image.channels === 3;
}

export function createChannelControl(spec: ChannelToggleSpec, fontSize: number): ChannelControl {
  return {
    style: "checkbox",
    tag: spec.tag,
    label: spec.label,
    channel: spec.channel,
    units: "normalized",
    position: spec.position,
    fontSize,
    backgroundColor: [...FIGURE_COLOR],
    min: 0,
    max: 1,
    value: 1,
    userData: null,
  };
}

export function findChannelControl(figure: Figure, tag: ChannelTag): ChannelControl {
  const control = figure.controls.find((c) => c.tag === tag);
  if (!control) throw new Error(`Figure ${figure.number} has no '${tag}' control.`);
  return control;
}

/** Set a channel checkbox and hide (0) or restore (1) that channel in every colour image. */
export function toggleChannel(figure: Figure, tag: ChannelTag, value: 0 | 1): void {
  const control = findChannelControl(figure, tag);
  control.value = value;
  const images = figure.images.filter(isColorImage);
  if (images.length === 0) return;

  if (value === 0) {
    control.userData = images.map((image) => extractChannel(image, control.channel));
    for (const image of images) fillChannel(image, control.channel, 0);
    return;
  }

  const remembered = control.userData;
  if (!remembered) return;
  images.forEach((image, i) => {
    const plane = remembered[i];
    if (plane && plane.length === image.width * image.height) writeChannel(image, control.channel, plane);
  });
}

/** Visibility of each channel by label, e.g. { R: true, G: false, B: true }. */
export function channelVisibility(figure: Figure): Record<string, boolean> {
  const out: Record<string, boolean> = {};
  for (const control of figure.controls) out[control.label] = control.value === 1;
  return out;
}

/** Re-check every box and forget remembered planes, for when the figure shows new images. */
export function resetChannelControls(figure: Figure): void {
  for (const control of figure.controls) {
    control.value = 1;
    control.userData = null;
  }
}
