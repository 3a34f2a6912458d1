import type { ClassifierOptions, GestureSnapshot, Point } from "./types";

export const LANDMARK_COUNT = 21;

export const WRIST = 0;
export const THUMB_TIP = 4;
export const INDEX_TIP = 8;
export const FINGER_TIPS = [8, 12, 16, 20] as const;
export const FINGER_MIDS = [6, 10, 14, 18] as const;
export const FINGER_BASES = [5, 9, 13, 17] as const;

const DEFAULTS: Required<ClassifierOptions> = {
  pinchThresholdPx: 30,
};

/**
 * Derives the gesture predicates for one hand. Expects exactly
 * {@link LANDMARK_COUNT} points in pixel space.
 *
 * The pinch threshold is measured in raw pixels, so a threshold tuned at one
 * capture resolution will be too loose or too tight at another.
 */
export function classifyHand(landmarks: Point[], opts?: ClassifierOptions): GestureSnapshot {
  const options = { ...DEFAULTS, ...(opts ?? {}) };
  const wrist = landmarks[WRIST];
  return {
    fist: countFingers(landmarks, (tip, mid) => tip.y > mid.y) >= FINGER_TIPS.length,
    openHand: countFingers(landmarks, (tip, mid) => tip.y < mid.y) >= FINGER_TIPS.length,
    pinch: pinchDistance(landmarks) < options.pinchThresholdPx,
    position: { x: wrist.x, y: wrist.y },
  };
}

export function pinchDistance(landmarks: Point[]): number {
  return distance2D(landmarks[THUMB_TIP], landmarks[INDEX_TIP]);
}

function countFingers(landmarks: Point[], predicate: (tip: Point, mid: Point) => boolean): number {
  let count = 0;
  FINGER_TIPS.forEach((tipIndex, i) => {
    if (predicate(landmarks[tipIndex], landmarks[FINGER_MIDS[i]])) {
      count += 1;
    }
  });
  return count;
}

function distance2D(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export { DEFAULTS as defaultClassifierOptions };
