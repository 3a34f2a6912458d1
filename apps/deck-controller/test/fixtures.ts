import type { Detection, FrameSource, RecordedFrame } from "@gesture-deck/landmark-source";

export type Pose = "fist" | "open" | "flat";

const TIP_Y: Record<Pose, number> = { fist: 360, open: 300, flat: 340 };

/** Pixel-space detector output for a 1280x720 frame. */
export function detection(handedness: string, pose: Pose, pinch = false): Detection {
  const keypoints = Array.from({ length: 21 }, () => ({ x: 600, y: 420 }));
  keypoints[0] = { x: 600, y: 500 };
  [560, 590, 620, 650].forEach((x, i) => {
    const base = 5 + i * 4;
    keypoints[base] = { x, y: 380 };
    keypoints[base + 1] = { x, y: 340 };
    keypoints[base + 3] = { x, y: TIP_Y[pose] };
  });
  keypoints[4] = pinch ? { x: 570, y: TIP_Y[pose] } : { x: 500, y: 420 };
  return { handedness, keypoints };
}

export function recordedFrame(hands: Detection[]): RecordedFrame {
  return { width: 1280, height: 720, hands };
}

export class ArrayFrameSource<TFrame> implements FrameSource<TFrame> {
  closed = false;
  private index = 0;

  constructor(private readonly items: Array<TFrame | Error>) {}

  async read(): Promise<TFrame | null> {
    if (this.index >= this.items.length) return null;
    const item = this.items[this.index++];
    if (item instanceof Error) throw item;
    return item;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeClock {
  now = 0;
  readonly sleeps: number[] = [];

  readonly clock = () => this.now;

  readonly sleep = async (ms: number) => {
    this.sleeps.push(ms);
    this.now += ms;
  };
}
