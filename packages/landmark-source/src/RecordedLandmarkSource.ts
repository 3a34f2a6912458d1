import type { HandObservation } from "@gesture-deck/gesture-core";
import { mapDetectionsToHandObservations } from "./mapDetections";
import type { LandmarkSource, MapDetectionsOptions, RecordedFrame } from "./types";

export class RecordedLandmarkSource implements LandmarkSource<RecordedFrame> {
  constructor(private readonly options: MapDetectionsOptions = {}) {}

  async process(frame: RecordedFrame): Promise<HandObservation[]> {
    return mapDetectionsToHandObservations(frame.hands, frame, this.options);
  }

  timestampOf(frame: RecordedFrame): number | undefined {
    return frame.timestamp;
  }
}

/** For running the pipeline without a detector. */
export class StubLandmarkSource<TFrame> implements LandmarkSource<TFrame> {
  async process(_frame: TFrame): Promise<HandObservation[]> {
    return [];
  }
}
