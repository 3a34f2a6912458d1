import type { Handedness, HandObservation, Point } from "../src";

export type Pose = "fist" | "open" | "flat";

export type HandSpec = {
  handedness?: Handedness;
  pose?: Pose;
  pinch?: boolean;
  /** Thumb tip x when not pinching; the palm centre sits at x = 605. */
  thumbX?: number;
};

const BASE_XS = [560, 590, 620, 650];
const BASE_Y = 380;
const MID_Y = 340;
const TIP_Y: Record<Pose, number> = { fist: 360, open: 300, flat: MID_Y };

/** A 21-point hand laid out for a 1280x720 capture. */
export function buildHand({ handedness = "unknown", pose = "flat", pinch = false, thumbX = 500 }: HandSpec = {}): HandObservation {
  const landmarks: Point[] = Array.from({ length: 21 }, () => ({ x: 600, y: 420 }));
  landmarks[0] = { x: 600, y: 500 };
  BASE_XS.forEach((x, i) => {
    const base = 5 + i * 4;
    landmarks[base] = { x, y: BASE_Y };
    landmarks[base + 1] = { x, y: MID_Y };
    landmarks[base + 3] = { x, y: TIP_Y[pose] };
  });
  const indexTip = landmarks[8];
  landmarks[4] = pinch ? { x: indexTip.x + 10, y: indexTip.y } : { x: thumbX, y: 420 };
  return { handedness, landmarks };
}
