import type { ControlEvent, Deck } from "@gesture-deck/gesture-core";
import defaultBindings from "./mixxxKeyBindings.json";
import { EmitTimeoutError, UnboundActionError, toError } from "./errors";
import type {
  ControllerStatus,
  DeckKeyControllerOptions,
  DispatchedEvent,
  KeyBindings,
  OutputSink,
  SinkResult,
} from "./types";

export const defaultKeyBindings: KeyBindings = { ...defaultBindings };

const DEFAULTS: Required<DeckKeyControllerOptions> = {
  bindings: defaultKeyBindings,
  emitTimeoutMs: 250,
  logger: console,
};

export function bindingName(event: ControlEvent): string {
  return `${event.action}_${event.deck}`;
}

function mergeOptions(opts?: DeckKeyControllerOptions): Required<DeckKeyControllerOptions> {
  return {
    ...DEFAULTS,
    ...opts,
    bindings: { ...defaultKeyBindings, ...(opts?.bindings ?? {}) },
  };
}

/**
 * Turns control events into key presses. Presses are best-effort: a failed or
 * slow sink is logged and the event is dropped.
 */
export class DeckKeyController {
  private readonly options: Required<DeckKeyControllerOptions>;
  private playing: Record<Deck, boolean> = { left: false, right: false };
  private sent = 0;
  private failed = 0;

  constructor(
    private readonly sink: OutputSink,
    opts?: DeckKeyControllerOptions
  ) {
    this.options = mergeOptions(opts);
  }

  /** An empty binding disables the action. */
  keyFor(event: ControlEvent): string | undefined {
    return this.options.bindings[bindingName(event)];
  }

  async handle(event: ControlEvent): Promise<DispatchedEvent> {
    const { logger } = this.options;
    const key = this.keyFor(event);
    if (!key) {
      const error = new UnboundActionError(bindingName(event));
      this.failed += 1;
      logger.warn(error.message);
      return { event, result: { ok: false, error } };
    }

    const result = await this.emitWithTimeout(key);
    if (!result.ok) {
      this.failed += 1;
      logger.warn(`Failed to send key '${key}': ${result.error.message}`);
      return { event, key, result };
    }

    this.sent += 1;
    logger.debug(`Sent key: ${key}`);
    if (event.action === "play_pause") {
      this.playing[event.deck] = !this.playing[event.deck];
      logger.info(`${event.deck} deck: ${this.playing[event.deck] ? "Playing" : "Paused"}`);
    }
    return { event, key, result };
  }

  /** Sends events one after another, in order. */
  async handleAll(events: ControlEvent[]): Promise<DispatchedEvent[]> {
    const dispatched: DispatchedEvent[] = [];
    for (const event of events) {
      dispatched.push(await this.handle(event));
    }
    return dispatched;
  }

  getStatus(): ControllerStatus {
    return {
      controllerType: "keyboard",
      sink: this.sink.kind,
      simulationMode: this.sink.kind === "simulation",
      playing: { ...this.playing },
      sent: this.sent,
      failed: this.failed,
    };
  }

  private async emitWithTimeout(key: string): Promise<SinkResult> {
    const { emitTimeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<SinkResult>((resolve) => {
      timer = setTimeout(() => resolve({ ok: false, error: new EmitTimeoutError(key, emitTimeoutMs) }), emitTimeoutMs);
    });
    try {
      return await Promise.race([
        // A sink may throw before it hands back a promise.
        Promise.resolve()
          .then(() => this.sink.emit(key))
          .catch((err: unknown): SinkResult => ({ ok: false, error: toError(err) })),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export { DEFAULTS as defaultDeckKeyControllerOptions };
