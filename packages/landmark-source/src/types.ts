import type { HandObservation } from "@gesture-deck/gesture-core";
import { z } from "zod";

export const keypointSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

/** Raw detector output for one hand, in the shape hand-pose detectors report it. */
export const detectionSchema = z.object({
  handedness: z.union([z.string(), z.object({ label: z.string() })]).optional(),
  keypoints: z.array(keypointSchema),
});

export const recordedFrameSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  timestamp: z.number().optional(),
  hands: z.array(detectionSchema),
});

export type Keypoint = z.infer<typeof keypointSchema>;
export type Detection = z.infer<typeof detectionSchema>;
export type RecordedFrame = z.infer<typeof recordedFrameSchema>;

export interface FrameSize {
  width: number;
  height: number;
}

export interface FrameSource<TFrame> {
  /** Resolves to null once the source is exhausted. */
  read(): Promise<TFrame | null>;
  close(): Promise<void>;
}

export interface LandmarkSource<TFrame> {
  /** Hands found in the frame, with landmarks in pixel coordinates. */
  process(frame: TFrame): Promise<HandObservation[]>;
  /** Capture time carried by the frame itself, in milliseconds. */
  timestampOf?(frame: TFrame): number | undefined;
}

export interface MapDetectionsOptions {
  /** Keypoints arrive in [0,1] and are scaled by the frame size. */
  normalized?: boolean;
}
