import { describe, test, expect } from "vitest";
import { Bitmap } from "../bitmap";
import { MARKER_COLOR, TerminalPresenter, encodeFrame, parseMouse, type PresenterIO } from "./terminal";

const ESC = "\u001b";

function fakeIO(columns = 80, rows = 24) {
  const writes: string[] = [];
  const io: PresenterIO = {
    write: (chunk) => {
      writes.push(chunk);
    },
    size: () => ({ columns, rows }),
  };
  return { io, writes };
}

describe("encodeFrame", () => {
  test("packs two storage rows into one half-block cell", () => {
    const bitmap = new Bitmap(1, 2, Uint32Array.of(0x00ff0000, 0x000000ff));

    expect(encodeFrame(bitmap, 80, 24)).toBe(
      `${ESC}[H${ESC}[38;2;255;0;0m${ESC}[48;2;0;0;255m▀${ESC}[0m`
    );
  });

  test("leaves the background default under an odd last row", () => {
    const bitmap = new Bitmap(1, 1, Uint32Array.of(0xff102030));

    expect(encodeFrame(bitmap, 80, 24)).toBe(`${ESC}[H${ESC}[38;2;16;32;48m${ESC}[49m▀${ESC}[0m`);
  });

  test("crops to the terminal size", () => {
    const bitmap = new Bitmap(3, 6);
    const frame = encodeFrame(bitmap, 2, 2);
    const lines = frame.slice(`${ESC}[H`.length).split("\r\n");

    expect(lines).toHaveLength(2);
    expect(lines.every((line) => line.split("▀").length - 1 === 2)).toBe(true);
  });
});

describe("parseMouse", () => {
  test("decodes SGR presses, releases and motion", () => {
    expect(parseMouse(`${ESC}[<0;3;2M${ESC}[<0;3;2m${ESC}[<32;4;2M`)).toEqual([
      { button: 0, column: 2, row: 1, pressed: true, motion: false },
      { button: 0, column: 2, row: 1, pressed: false, motion: false },
      { button: 0, column: 3, row: 1, pressed: true, motion: true },
    ]);
  });

  test("ignores plain keys", () => {
    expect(parseMouse("q")).toEqual([]);
  });
});

describe("TerminalPresenter", () => {
  test("left click paints the pixel under the cursor and repaints", () => {
    const bitmap = new Bitmap(4, 4);
    const { io, writes } = fakeIO();
    const presenter = new TerminalPresenter(bitmap, io);

    expect(presenter.handleInput(`${ESC}[<0;2;1M`)).toBe("repaint");
    expect(bitmap.get(1, 3)).toBe(MARKER_COLOR);
    expect(bitmap.buffer[1]).toBe(MARKER_COLOR);
    expect(presenter.markers).toBe(1);
    expect(writes).toHaveLength(1);
  });

  test("clicks outside the image have no effect", () => {
    const bitmap = new Bitmap(4, 4);
    const { io, writes } = fakeIO();
    const presenter = new TerminalPresenter(bitmap, io);

    expect(presenter.handleInput(`${ESC}[<0;10;1M`)).toBe("ignored");
    expect(presenter.handleInput(`${ESC}[<0;1;5M`)).toBe("ignored");
    expect(presenter.handleInput(`${ESC}[<2;1;1M`)).toBe("ignored");
    expect([...bitmap.buffer].every((p) => p === 0)).toBe(true);
    expect(writes).toHaveLength(0);
  });

  test("q, Esc and Ctrl-C quit", () => {
    const { io } = fakeIO();
    const presenter = new TerminalPresenter(new Bitmap(1, 1), io);

    expect(presenter.handleInput("q")).toBe("quit");
    expect(presenter.handleInput(ESC)).toBe("quit");
    expect(presenter.handleInput("\u0003")).toBe("quit");
  });

  test("quits on a key that shares a chunk with a mouse report", () => {
    const { io, writes } = fakeIO();
    const bitmap = new Bitmap(1, 1);
    const presenter = new TerminalPresenter(bitmap, io);

    expect(presenter.handleInput(`${ESC}[<0;1;1Mq`)).toBe("quit");
    expect(presenter.handleInput(`q${ESC}[<0;1;1m`)).toBe("quit");
    expect(bitmap.get(0, 0)).toBe(0);
    expect(writes).toHaveLength(0);
  });

  test("a bare mouse report is not mistaken for Esc", () => {
    const { io } = fakeIO();
    const presenter = new TerminalPresenter(new Bitmap(1, 1), io);

    expect(presenter.handleInput(`${ESC}[<0;1;1m`)).toBe("ignored");
  });
});
