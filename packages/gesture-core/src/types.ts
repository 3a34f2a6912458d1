export type Handedness = "left" | "right" | "unknown";

/** Pixel coordinates; y grows downward. */
export interface Point {
  x: number;
  y: number;
}

export interface HandObservation {
  handedness: Handedness;
  landmarks: Point[];
}

export interface HandFrame {
  hands: HandObservation[];
  /** Monotonic milliseconds. */
  timestamp: number;
}

export interface GestureSnapshot {
  fist: boolean;
  openHand: boolean;
  pinch: boolean;
  /** Wrist landmark. */
  position: Point;
}

export type HandId = "left_hand" | "right_hand";

export type Deck = "left" | "right";

export type DeckAction = "play_pause" | "crossfader_nudge";

export interface ControlEvent {
  deck: Deck;
  action: DeckAction;
}

export interface DeckControlState {
  previousFist: boolean;
  pinchActive: boolean;
  lastPinchEmitTime: number;
}

export type DeckStates = Record<Deck, DeckControlState>;

export type DeckSnapshots = Partial<Record<Deck, GestureSnapshot>>;

export interface ClassifierOptions {
  /** Thumb-to-index distance, in pixels, below which the hand is pinching. */
  pinchThresholdPx?: number;
}

export interface ResolverOptions extends ClassifierOptions {
  /** Estimate unknown handedness from thumb position; when false such hands are dropped. */
  geometricFallback?: boolean;
}

export interface MapperOptions {
  pinchRepeatIntervalMs?: number;
}

export type DeckGestureEngineOptions = ResolverOptions & MapperOptions;

export interface GestureDebugState {
  hands: Partial<Record<HandId, GestureSnapshot>>;
  decks: DeckStates;
  droppedHands: number;
  overwrittenHands: number;
}
