import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import { RecordingFormatError } from "./errors";
import { recordedFrameSchema } from "./types";
import type { FrameSource, RecordedFrame } from "./types";

export function parseRecordedFrame(text: string, line: number): RecordedFrame {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new RecordingFormatError(line, err instanceof Error ? err.message : String(err));
  }
  const parsed = recordedFrameSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RecordingFormatError(line, `${issue.path.join(".") || "frame"}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Replays detector output captured one frame per line. Lines are read on
 * demand; a malformed line fails that read only.
 */
export class JsonlFrameSource implements FrameSource<RecordedFrame> {
  private readonly reader: Interface;
  private readonly lines: AsyncIterator<string>;
  private lineNumber = 0;

  private constructor(path: string) {
    this.reader = createInterface({ input: createReadStream(path, { encoding: "utf8" }), crlfDelay: Infinity });
    this.lines = this.reader[Symbol.asyncIterator]();
  }

  static async open(path: string): Promise<JsonlFrameSource> {
    await access(path);
    return new JsonlFrameSource(path);
  }

  async read(): Promise<RecordedFrame | null> {
    for (;;) {
      const next = await this.lines.next();
      if (next.done) return null;
      this.lineNumber += 1;
      const text = next.value.trim();
      if (text) return parseRecordedFrame(text, this.lineNumber);
    }
  }

  async close(): Promise<void> {
    this.reader.close();
  }
}
