/**
 * Source of raw operator keystrokes.
 * `acquire` switches the terminal into character-at-a-time mode and returns
 * the matching release; the release restores the previous mode and may be
 * called more than once.
 */
export interface KeystrokeSource {
  acquire(onKey: (key: string) => void): () => void;
}

/**
 * The parts of a TTY read stream the keystroke source drives
 */
export interface RawInput {
  readonly isRaw: boolean;
  setRawMode(mode: boolean): unknown;
  on(event: "data", listener: (data: Buffer | string) => void): unknown;
  off(event: "data", listener: (data: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/**
 * Keystrokes read from a TTY stream in raw mode
 */
export class TtyKeystrokeSource implements KeystrokeSource {
  constructor(private readonly input: RawInput) {}

  acquire(onKey: (key: string) => void): () => void {
    const input = this.input;
    const wasRaw = input.isRaw;

    const listener = (data: Buffer | string) => {
      const text = typeof data === "string" ? data : data.toString("utf8");
      for (const key of text) {
        onKey(key);
      }
    };

    input.setRawMode(true);
    input.on("data", listener);
    input.resume();

    let released = false;
    return () => {
      if (released) return;
      released = true;
      input.off("data", listener);
      input.pause();
      input.setRawMode(wasRaw);
    };
  }
}

/**
 * Keystroke source for stdin, absent when stdin is not an interactive terminal
 */
export function createKeystrokeSource(
  input: RawInput & { readonly isTTY?: boolean } = process.stdin
): KeystrokeSource | undefined {
  return input.isTTY ? new TtyKeystrokeSource(input) : undefined;
}
