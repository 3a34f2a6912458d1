import type {
  ControlEvent,
  Deck,
  DeckControlState,
  DeckSnapshots,
  DeckStates,
  GestureSnapshot,
  HandId,
  MapperOptions,
} from "./types";

const DEFAULTS: Required<MapperOptions> = {
  pinchRepeatIntervalMs: 200,
};

export const DECK_ORDER: readonly Deck[] = ["left", "right"];

export function deckForHand(hand: HandId): Deck {
  return hand === "left_hand" ? "left" : "right";
}

export function initialDeckState(): DeckControlState {
  return { previousFist: false, pinchActive: false, lastPinchEmitTime: 0 };
}

export function initialDeckStates(): DeckStates {
  return { left: initialDeckState(), right: initialDeckState() };
}

export interface DeckStep {
  state: DeckControlState;
  events: ControlEvent[];
}

/**
 * Advances one deck by one frame. Play/pause fires on the rising edge of a
 * fist only; a held pinch repeats the nudge at most once per
 * `pinchRepeatIntervalMs`.
 */
export function stepDeck(
  deck: Deck,
  state: DeckControlState,
  snapshot: GestureSnapshot,
  now: number,
  opts?: MapperOptions
): DeckStep {
  const options = { ...DEFAULTS, ...(opts ?? {}) };
  const events: ControlEvent[] = [];
  const next: DeckControlState = { ...state };

  if (snapshot.fist && !state.previousFist) {
    events.push({ deck, action: "play_pause" });
  }
  next.previousFist = snapshot.fist;

  if (snapshot.pinch && !state.pinchActive) {
    events.push({ deck, action: "crossfader_nudge" });
    next.pinchActive = true;
    next.lastPinchEmitTime = now;
  } else if (snapshot.pinch && state.pinchActive) {
    if (now - state.lastPinchEmitTime > options.pinchRepeatIntervalMs) {
      events.push({ deck, action: "crossfader_nudge" });
      next.lastPinchEmitTime = now;
    }
  } else if (!snapshot.pinch && state.pinchActive) {
    next.pinchActive = false;
  }

  return { state: next, events };
}

export interface FrameStep {
  states: DeckStates;
  events: ControlEvent[];
}

/** Decks without a snapshot keep their state and emit nothing. */
export function mapFrame(
  states: DeckStates,
  snapshots: DeckSnapshots,
  now: number,
  opts?: MapperOptions
): FrameStep {
  const next: DeckStates = { ...states };
  const events: ControlEvent[] = [];

  for (const deck of DECK_ORDER) {
    const snapshot = snapshots[deck];
    if (!snapshot) continue;
    const step = stepDeck(deck, states[deck], snapshot, now, opts);
    next[deck] = step.state;
    events.push(...step.events);
  }

  return { states: next, events };
}

export { DEFAULTS as defaultMapperOptions };
