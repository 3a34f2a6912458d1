export * from "./types";
export * from "./classifyHand";
export * from "./resolveHands";
export * from "./controlMapper";
export * from "./DeckGestureEngine";
