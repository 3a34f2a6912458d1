import type { ControlEvent, Deck } from "@gesture-deck/gesture-core";

/** Semantic action name (`<action>_<deck>`) to key symbol. */
export type KeyBindings = Record<string, string>;

export type SinkResult = { ok: true } | { ok: false; error: Error };

export interface OutputSink {
  readonly kind: string;
  emit(key: string): Promise<SinkResult>;
}

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface DeckKeyControllerOptions {
  /** Merged over the default Mixxx bindings. */
  bindings?: KeyBindings;
  /** Longest wait for the sink before the key press is given up. */
  emitTimeoutMs?: number;
  logger?: Logger;
}

export interface DispatchedEvent {
  event: ControlEvent;
  key?: string;
  result: SinkResult;
}

export interface ControllerStatus {
  controllerType: "keyboard";
  sink: string;
  simulationMode: boolean;
  playing: Record<Deck, boolean>;
  sent: number;
  failed: number;
}
