/**
 * Terminal presentation loop: draws the framebuffer with truecolor half
 * blocks and paints a marker wherever the user clicks.
 */

import type { Bitmap } from "../bitmap";
import { createLogger, setLogSink } from "../log";
import { unpackColor } from "../render";

const log = createLogger("view");

export const MARKER_COLOR = 0xffffffff;

const ESC = "\u001b";
const UPPER_HALF = "▀";

// =============================================================================
// Frame Encoding
// =============================================================================

function rgb(packed: number): string {
  const [r, g, b] = unpackColor(packed);
  return `${r};${g};${b}`;
}

/**
 * ANSI text for the top-left `columns` x `rows` cells of the bitmap. Each
 * cell shows two storage rows: the upper one as foreground, the lower one
 * as background.
 */
export function encodeFrame(bitmap: Bitmap, columns: number, rows: number): string {
  const cols = Math.min(columns, bitmap.width);
  const cellRows = Math.min(rows, Math.ceil(bitmap.height / 2));
  const lines: string[] = [];

  for (let cell = 0; cell < cellRows; cell++) {
    const top = 2 * cell;
    const bottom = top + 1;
    let line = "";
    for (let x = 0; x < cols; x++) {
      const upper = bitmap.buffer[top * bitmap.width + x] ?? 0;
      line += `${ESC}[38;2;${rgb(upper)}m`;
      if (bottom < bitmap.height) {
        const lower = bitmap.buffer[bottom * bitmap.width + x] ?? 0;
        line += `${ESC}[48;2;${rgb(lower)}m`;
      } else {
        line += `${ESC}[49m`;
      }
      line += UPPER_HALF;
    }
    lines.push(`${line}${ESC}[0m`);
  }

  return `${ESC}[H${lines.join("\r\n")}`;
}

// =============================================================================
// Input
// =============================================================================

export interface MouseEvent {
  button: number;
  /** Zero-based terminal cell. */
  column: number;
  row: number;
  pressed: boolean;
  motion: boolean;
}

const SGR_MOUSE = /\u001b\[<(\d+);(\d+);(\d+)([Mm])/g;

/** Decodes SGR (1006) mouse reports. */
export function parseMouse(data: string): MouseEvent[] {
  const events: MouseEvent[] = [];
  for (const match of data.matchAll(SGR_MOUSE)) {
    const code = Number(match[1]);
    events.push({
      button: code & 3,
      column: Number(match[2]) - 1,
      row: Number(match[3]) - 1,
      pressed: match[4] === "M",
      motion: (code & 32) !== 0,
    });
  }
  return events;
}

/** Bitmap coordinates (y up) of the upper pixel under a terminal cell. */
export function cellToPixel(bitmap: Bitmap, column: number, row: number): [number, number] {
  return [column, bitmap.height - 1 - 2 * row];
}

// =============================================================================
// Presenter
// =============================================================================

export interface PresenterIO {
  write(chunk: string): void;
  size(): { columns: number; rows: number };
}

export type InputOutcome = "quit" | "repaint" | "ignored";

export class TerminalPresenter {
  markers = 0;

  constructor(
    readonly bitmap: Bitmap,
    private io: PresenterIO
  ) {}

  repaint(): void {
    const { columns, rows } = this.io.size();
    this.io.write(encodeFrame(this.bitmap, columns, rows));
  }

  handleInput(data: string): InputOutcome {
    const keys = data.replace(SGR_MOUSE, "");
    if (keys === ESC || keys.includes("q") || keys.includes("\u0003")) {
      return "quit";
    }

    let painted = false;
    for (const event of parseMouse(data)) {
      if (!event.pressed || event.motion || event.button !== 0) continue;
      const [x, y] = cellToPixel(this.bitmap, event.column, event.row);
      if (this.bitmap.set(x, y, MARKER_COLOR)) {
        this.markers++;
        painted = true;
      }
    }

    if (painted) {
      this.repaint();
      return "repaint";
    }
    return "ignored";
  }
}

// =============================================================================
// Process Wiring
// =============================================================================

const ENTER = `${ESC}[?1049h${ESC}[?25l${ESC}[?1000h${ESC}[?1006h${ESC}[2J`;
const LEAVE = `${ESC}[?1006l${ESC}[?1000l${ESC}[?25h${ESC}[?1049l`;

/**
 * Shows `bitmap` on the controlling terminal until q, Esc or Ctrl-C.
 * Log lines emitted meanwhile are held back and flushed afterwards.
 */
export function present(bitmap: Bitmap): Promise<void> {
  const { stdin, stdout } = process;
  const held: string[] = [];
  const previousSink = setLogSink((line) => held.push(line));

  const presenter = new TerminalPresenter(bitmap, {
    write: (chunk) => {
      stdout.write(chunk);
    },
    size: () => ({ columns: stdout.columns, rows: stdout.rows }),
  });

  return new Promise((resolve) => {
    const onResize = () => {
      stdout.write(`${ESC}[2J`);
      presenter.repaint();
    };

    const onData = (data: Buffer) => {
      if (presenter.handleInput(data.toString()) !== "quit") return;

      stdin.off("data", onData);
      stdout.off("resize", onResize);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write(LEAVE);
      setLogSink(previousSink);
      for (const line of held) previousSink(line);
      log.info(`closed viewer, ${presenter.markers} marker(s) drawn`);
      resolve();
    };

    stdout.write(ENTER);
    stdin.setRawMode(true);
    stdin.resume();
    stdin.on("data", onData);
    stdout.on("resize", onResize);
    presenter.repaint();
  });
}
