import { FINGER_BASES, LANDMARK_COUNT, THUMB_TIP, classifyHand, defaultClassifierOptions } from "./classifyHand";
import type { GestureSnapshot, HandId, HandObservation, Point, ResolverOptions } from "./types";

const DEFAULTS: Required<ResolverOptions> = {
  ...defaultClassifierOptions,
  geometricFallback: true,
};

export interface ResolvedHands {
  hands: Partial<Record<HandId, GestureSnapshot>>;
  /** Hands discarded for missing landmarks or unresolvable handedness. */
  dropped: number;
  /** Hands replaced by a later hand resolving to the same id. */
  overwritten: number;
}

/**
 * The detector labels hands as seen by a mirrored camera, so its "left" is
 * the performer's right hand.
 */
export function invertHandedness(handedness: "left" | "right"): HandId {
  return handedness === "left" ? "right_hand" : "left_hand";
}

/** Thumb left of the palm centre reads as a right hand. */
export function estimateHandIdFromGeometry(landmarks: Point[]): HandId {
  const palmX = FINGER_BASES.reduce((sum, i) => sum + landmarks[i].x, 0) / FINGER_BASES.length;
  return landmarks[THUMB_TIP].x < palmX ? "right_hand" : "left_hand";
}

export function resolveHandId(hand: HandObservation, opts?: ResolverOptions): HandId | null {
  const options = { ...DEFAULTS, ...(opts ?? {}) };
  if (hand.landmarks.length < LANDMARK_COUNT) return null;
  if (hand.handedness === "left" || hand.handedness === "right") {
    return invertHandedness(hand.handedness);
  }
  return options.geometricFallback ? estimateHandIdFromGeometry(hand.landmarks) : null;
}

/**
 * Classifies every usable hand of a frame. When two hands resolve to the same
 * id, the later one wins and is counted in `overwritten`.
 */
export function resolveHands(observations: HandObservation[], opts?: ResolverOptions): ResolvedHands {
  const options = { ...DEFAULTS, ...(opts ?? {}) };
  const result: ResolvedHands = { hands: {}, dropped: 0, overwritten: 0 };

  for (const hand of observations) {
    const id = resolveHandId(hand, options);
    if (id === null) {
      result.dropped += 1;
      continue;
    }
    if (result.hands[id]) {
      result.overwritten += 1;
    }
    result.hands[id] = classifyHand(hand.landmarks, options);
  }

  return result;
}

export { DEFAULTS as defaultResolverOptions };
