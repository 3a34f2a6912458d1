import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { classifyHand, pinchDistance } from "../src";
import { buildHand } from "./fixtures";

describe("classifyHand", () => {
  it("detects a fist when every fingertip is below its middle joint", () => {
    const snapshot = classifyHand(buildHand({ pose: "fist" }).landmarks);
    expect(snapshot.fist).toBe(true);
    expect(snapshot.openHand).toBe(false);
  });

  it("detects an open hand when every fingertip is above its middle joint", () => {
    const snapshot = classifyHand(buildHand({ pose: "open" }).landmarks);
    expect(snapshot.fist).toBe(false);
    expect(snapshot.openHand).toBe(true);
  });

  it("reports neither pose when tips sit level with their joints", () => {
    const snapshot = classifyHand(buildHand({ pose: "flat" }).landmarks);
    expect(snapshot.fist).toBe(false);
    expect(snapshot.openHand).toBe(false);
  });

  it("reports neither pose when only some fingers are curled", () => {
    const { landmarks } = buildHand({ pose: "open" });
    landmarks[8] = { x: 560, y: 360 };
    landmarks[12] = { x: 590, y: 360 };
    const snapshot = classifyHand(landmarks);
    expect(snapshot.fist).toBe(false);
    expect(snapshot.openHand).toBe(false);
  });

  it("treats a thumb-index distance of exactly 30px as no pinch", () => {
    const { landmarks } = buildHand();
    landmarks[4] = { x: landmarks[8].x + 30, y: landmarks[8].y };
    expect(pinchDistance(landmarks)).toBe(30);
    expect(classifyHand(landmarks).pinch).toBe(false);
  });

  it("treats a distance just under 30px as a pinch", () => {
    const { landmarks } = buildHand();
    landmarks[4] = { x: landmarks[8].x + 29.999, y: landmarks[8].y };
    expect(classifyHand(landmarks).pinch).toBe(true);
  });

  it("takes the pinch threshold from options", () => {
    const { landmarks } = buildHand();
    landmarks[4] = { x: landmarks[8].x + 40, y: landmarks[8].y };
    expect(classifyHand(landmarks).pinch).toBe(false);
    expect(classifyHand(landmarks, { pinchThresholdPx: 45 }).pinch).toBe(true);
  });

  it("returns a copy of the wrist as the position", () => {
    const { landmarks } = buildHand({ pose: "fist" });
    const snapshot = classifyHand(landmarks);
    expect(snapshot.position).toEqual({ x: 600, y: 500 });
    expect(snapshot.position).not.toBe(landmarks[0]);
  });

  it("never reports a fist and an open hand together", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 720 }), { minLength: 8, maxLength: 8 }),
        (ys) => {
          const { landmarks } = buildHand();
          [6, 10, 14, 18].forEach((mid, i) => {
            landmarks[mid] = { x: landmarks[mid].x, y: ys[i * 2] };
            landmarks[mid + 2] = { x: landmarks[mid + 2].x, y: ys[i * 2 + 1] };
          });
          const snapshot = classifyHand(landmarks);
          return !(snapshot.fist && snapshot.openHand);
        }
      )
    );
  });
});
