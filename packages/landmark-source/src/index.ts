export * from "./types";
export * from "./errors";
export * from "./mapDetections";
export * from "./JsonlFrameSource";
export * from "./RecordedLandmarkSource";
