export class RecordingFormatError extends Error {
  constructor(
    readonly line: number,
    message: string
  ) {
    super(`Recording line ${line}: ${message}`);
    this.name = "RecordingFormatError";
  }
}
