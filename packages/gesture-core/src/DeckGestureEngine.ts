import { deckForHand, defaultMapperOptions, initialDeckStates, mapFrame } from "./controlMapper";
import { defaultResolverOptions, resolveHands } from "./resolveHands";
import type {
  ControlEvent,
  DeckGestureEngineOptions,
  DeckSnapshots,
  DeckStates,
  GestureDebugState,
  GestureSnapshot,
  HandFrame,
  HandId,
} from "./types";

const DEFAULTS: Required<DeckGestureEngineOptions> = {
  ...defaultResolverOptions,
  ...defaultMapperOptions,
};

export class DeckGestureEngine {
  private readonly options: Required<DeckGestureEngineOptions>;
  private decks: DeckStates = initialDeckStates();
  private hands: Partial<Record<HandId, GestureSnapshot>> = {};
  private droppedHands = 0;
  private overwrittenHands = 0;

  constructor(opts?: DeckGestureEngineOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  update(frame: HandFrame): ControlEvent[] {
    const resolved = resolveHands(frame.hands, this.options);
    this.hands = resolved.hands;
    this.droppedHands = resolved.dropped;
    this.overwrittenHands = resolved.overwritten;

    const snapshots: DeckSnapshots = {};
    for (const [hand, snapshot] of entries(resolved.hands)) {
      snapshots[deckForHand(hand)] = snapshot;
    }

    const step = mapFrame(this.decks, snapshots, frame.timestamp, this.options);
    this.decks = step.states;
    return step.events;
  }

  reset(): void {
    this.decks = initialDeckStates();
    this.hands = {};
    this.droppedHands = 0;
    this.overwrittenHands = 0;
  }

  getDebugState(): GestureDebugState {
    return {
      hands: { ...this.hands },
      decks: { left: { ...this.decks.left }, right: { ...this.decks.right } },
      droppedHands: this.droppedHands,
      overwrittenHands: this.overwrittenHands,
    };
  }
}

export { DEFAULTS as defaultDeckGestureEngineOptions };

function entries(hands: Partial<Record<HandId, GestureSnapshot>>): [HandId, GestureSnapshot][] {
  const out: [HandId, GestureSnapshot][] = [];
  if (hands.left_hand) out.push(["left_hand", hands.left_hand]);
  if (hands.right_hand) out.push(["right_hand", hands.right_hand]);
  return out;
}
