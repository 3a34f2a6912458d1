import type { ControlEvent, Deck, GestureSnapshot, HandId } from "@gesture-deck/gesture-core";

export interface FrameReport {
  frame: number;
  timestamp: number;
  fps: number;
  processMs: number;
  hands: Partial<Record<HandId, GestureSnapshot>>;
  events: ControlEvent[];
  pinchActive: Record<Deck, boolean>;
  playing: Record<Deck, boolean>;
}

export interface SessionStats {
  frames: number;
  skippedFrames: number;
  events: number;
  failedEvents: number;
  elapsedMs: number;
  averageFps: number;
  averageProcessMs: number;
  stopReason: "end-of-stream" | "stopped" | "too-many-failures";
}

const HAND_IDS: HandId[] = ["left_hand", "right_hand"];

function describeSnapshot(snapshot: GestureSnapshot): string {
  const flags = [snapshot.fist && "fist", snapshot.openHand && "open", snapshot.pinch && "pinch"].filter(Boolean);
  return flags.length ? flags.join(" ") : "-";
}

/** The part of a report that changes only when the performer does something. */
export function describeGestures(report: FrameReport): string {
  const hands = HAND_IDS.flatMap((id) => {
    const snapshot = report.hands[id];
    return snapshot ? [`${id}[${describeSnapshot(snapshot)}]`] : [];
  });
  const pinch = `pinch L:${report.pinchActive.left ? "ACTIVE" : "OFF"} R:${report.pinchActive.right ? "ACTIVE" : "OFF"}`;
  return `${hands.length ? hands.join(" ") : "no hands"} | ${pinch}`;
}

export function formatFrameReport(report: FrameReport): string {
  const events = report.events.map((e) => `${e.action}_${e.deck}`).join(",") || "none";
  return `#${report.frame} fps ${report.fps.toFixed(1)} | ${report.processMs.toFixed(1)}ms | ${describeGestures(report)} | events: ${events}`;
}

export function formatSessionStats(stats: SessionStats): string {
  return [
    `Session ended (${stats.stopReason})`,
    `frames ${stats.frames}, skipped ${stats.skippedFrames}`,
    `events ${stats.events}, failed ${stats.failedEvents}`,
    `time ${(stats.elapsedMs / 1000).toFixed(2)}s, average fps ${stats.averageFps.toFixed(1)}, average processing ${stats.averageProcessMs.toFixed(1)}ms`,
  ].join(" | ");
}
