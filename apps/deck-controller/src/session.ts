import { setTimeout as sleepFor } from "node:timers/promises";
import { toError } from "@gesture-deck/control-core";
import type { DeckKeyController, Logger } from "@gesture-deck/control-core";
import type { DeckGestureEngine, HandObservation } from "@gesture-deck/gesture-core";
import type { FrameSource, LandmarkSource } from "@gesture-deck/landmark-source";
import { describeGestures, formatFrameReport } from "./telemetry";
import type { FrameReport, SessionStats } from "./telemetry";

export interface SessionOptions<TFrame> {
  frames: FrameSource<TFrame>;
  landmarks: LandmarkSource<TFrame>;
  engine: DeckGestureEngine;
  controller: DeckKeyController;
  /** Upper bound on frames per second; 0 runs as fast as frames arrive. */
  fps?: number;
  maxConsecutiveFailures?: number;
  /** Checked between frames; a frame in progress always completes. */
  signal?: AbortSignal;
  clock?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
  onFrame?: (report: FrameReport) => void;
}

/**
 * Runs the capture → detect → classify → map → emit loop until the frame
 * source ends or the signal fires. Frames are processed one at a time; a
 * frame whose capture or detection fails is logged and skipped. Frames that
 * carry their own capture time are mapped at that time rather than the clock's.
 */
export async function runSession<TFrame>(opts: SessionOptions<TFrame>): Promise<SessionStats> {
  const {
    frames,
    landmarks,
    engine,
    controller,
    fps = 30,
    maxConsecutiveFailures = 30,
    signal,
    clock = () => performance.now(),
    sleep = (ms: number) => sleepFor(ms),
    logger = console,
    onFrame,
  } = opts;

  const frameIntervalMs = fps > 0 ? 1000 / fps : 0;
  const start = clock();
  let stopReason: SessionStats["stopReason"] = "stopped";
  let frameCount = 0;
  let skippedFrames = 0;
  let consecutiveFailures = 0;
  let eventCount = 0;
  let failedEvents = 0;
  let totalProcessMs = 0;
  let fpsWindowStart = start;
  let fpsWindowFrames = 0;
  let currentFps = 0;
  let lastGestures = "";

  const pace = async (frameStart: number) => {
    const remaining = frameIntervalMs - (clock() - frameStart);
    if (remaining > 0) await sleep(remaining);
  };

  while (!signal?.aborted) {
    const frameStart = clock();
    let hands: HandObservation[];
    let timestamp: number;
    try {
      const frame = await frames.read();
      if (frame === null) {
        stopReason = "end-of-stream";
        break;
      }
      hands = await landmarks.process(frame);
      timestamp = landmarks.timestampOf?.(frame) ?? clock();
    } catch (err) {
      skippedFrames += 1;
      consecutiveFailures += 1;
      logger.warn(`Skipping frame: ${toError(err).message}`);
      if (consecutiveFailures >= maxConsecutiveFailures) {
        logger.error(`Giving up after ${consecutiveFailures} consecutive failed frames`);
        stopReason = "too-many-failures";
        break;
      }
      await pace(frameStart);
      continue;
    }
    consecutiveFailures = 0;

    const events = engine.update({ hands, timestamp });
    const dispatched = await controller.handleAll(events);
    const processMs = clock() - frameStart;

    frameCount += 1;
    eventCount += events.length;
    failedEvents += dispatched.filter((d) => !d.result.ok).length;
    totalProcessMs += processMs;

    fpsWindowFrames += 1;
    const windowMs = clock() - fpsWindowStart;
    if (windowMs >= 1000) {
      currentFps = (fpsWindowFrames * 1000) / windowMs;
      fpsWindowFrames = 0;
      fpsWindowStart = clock();
    }

    const debug = engine.getDebugState();
    const report: FrameReport = {
      frame: frameCount,
      timestamp: frameStart,
      fps: currentFps,
      processMs,
      hands: debug.hands,
      events,
      pinchActive: { left: debug.decks.left.pinchActive, right: debug.decks.right.pinchActive },
      playing: controller.getStatus().playing,
    };
    if (debug.overwrittenHands > 0) {
      logger.debug(`${debug.overwrittenHands} hand(s) resolved to an already seen deck; kept the later one`);
    }
    const gestures = describeGestures(report);
    if (events.length > 0 || gestures !== lastGestures) {
      logger.debug(formatFrameReport(report));
      lastGestures = gestures;
    }
    onFrame?.(report);

    await pace(frameStart);
  }

  const elapsedMs = clock() - start;
  return {
    frames: frameCount,
    skippedFrames,
    events: eventCount,
    failedEvents,
    elapsedMs,
    averageFps: elapsedMs > 0 ? (frameCount * 1000) / elapsedMs : 0,
    averageProcessMs: frameCount > 0 ? totalProcessMs / frameCount : 0,
    stopReason,
  };
}
