import type { Handedness, HandObservation, Point } from "@gesture-deck/gesture-core";
import type { Detection, FrameSize, Keypoint, MapDetectionsOptions } from "./types";

export function mapDetectionsToHandObservations(
  detections: Detection[],
  size: FrameSize,
  opts: MapDetectionsOptions = {}
): HandObservation[] {
  const normalized = opts.normalized ?? true;
  return detections.map((detection) => ({
    handedness: parseHandedness(detection.handedness),
    landmarks: detection.keypoints.map((kp) => toPixel(kp, size, normalized)),
  }));
}

export function parseHandedness(value: Detection["handedness"]): Handedness {
  const label = typeof value === "string" ? value : value?.label;
  switch (label?.toLowerCase()) {
    case "left":
      return "left";
    case "right":
      return "right";
    default:
      return "unknown";
  }
}

function toPixel(kp: Keypoint, size: FrameSize, normalized: boolean): Point {
  const x = normalized ? kp.x * size.width : kp.x;
  const y = normalized ? kp.y * size.height : kp.y;
  return { x: clampPixel(x, size.width), y: clampPixel(y, size.height) };
}

function clampPixel(value: number, extent: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(extent - 1, Math.max(0, Math.trunc(value)));
}
