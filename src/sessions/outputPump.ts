import readline from "node:readline";
import type { Readable } from "node:stream";
import type { LineSender } from "./lineChannel.js";

export type PumpSource = "stdout" | "stderr";

export const STDERR_PREFIX = "[stderr] ";

export type PumpHandle = {
  readonly source: PumpSource;
  readonly finished: boolean;
  readonly done: Promise<void>;
};

export type PumpOptions = {
  source: PumpSource;
  onError?: (error: Error) => void;
};

/**
 * Forwards every non-empty line of `stream` to `sender` until end-of-stream.
 * Bytes that are not valid UTF-8 come through as U+FFFD. The sender is closed
 * when the stream ends or fails; nothing else stops a pump.
 */
export function startPump(stream: Readable, sender: LineSender, options: PumpOptions): PumpHandle {
  const prefix = options.source === "stderr" ? STDERR_PREFIX : "";
  let finished = false;

  stream.setEncoding("utf8");
  const reader = readline.createInterface({
    input: stream,
    crlfDelay: Infinity,
  });

  const done = new Promise<void>((resolve) => {
    const finish = (): void => {
      if (finished) {
        return;
      }
      finished = true;
      sender.close();
      resolve();
    };

    reader.on("line", (line) => {
      if (line.length > 0) {
        sender.send(`${prefix}${line}`);
      }
    });

    reader.on("close", finish);

    // readline re-emits input errors on the interface
    reader.on("error", (error) => {
      options.onError?.(error);
      reader.close();
      finish();
    });
  });

  return {
    source: options.source,
    get finished() {
      return finished;
    },
    done,
  };
}
