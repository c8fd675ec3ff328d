import { describe, it, expect } from "vitest";
import { MemoryLedStrip } from "../memoryStrip";
import { ConsoleLedStrip } from "../consoleStrip";

describe("led/MemoryLedStrip", () => {
  it("starts dark", () => {
    const strip = new MemoryLedStrip(3);
    expect(strip.getFrame()).toEqual([[0, 0, 0], [0, 0, 0], [0, 0, 0]]);
  });

  it("setLed shows immediately by default", () => {
    const strip = new MemoryLedStrip(2);
    strip.setLed(1, [9, 8, 7]);
    expect(strip.getFrame()).toEqual([[0, 0, 0], [9, 8, 7]]);
  });

  it("deferred writes become visible on show()", () => {
    const strip = new MemoryLedStrip(2);
    strip.setLed(0, [1, 1, 1], false);
    strip.setLed(1, [2, 2, 2], false);
    expect(strip.getFrame()).toEqual([[0, 0, 0], [0, 0, 0]]);
    strip.show();
    expect(strip.getFrame()).toEqual([[1, 1, 1], [2, 2, 2]]);
  });

  it("fill paints every LED", () => {
    const strip = new MemoryLedStrip(3);
    strip.fill([5, 6, 7]);
    expect(strip.getFrame()).toEqual([[5, 6, 7], [5, 6, 7], [5, 6, 7]]);
  });

  it("rejects out-of-range indices and sizes", () => {
    const strip = new MemoryLedStrip(2);
    expect(() => strip.setLed(2, [1, 1, 1])).toThrow(RangeError);
    expect(() => strip.setLed(-1, [1, 1, 1])).toThrow(RangeError);
    expect(() => new MemoryLedStrip(-1)).toThrow(RangeError);
    expect(() => new MemoryLedStrip(1.5)).toThrow(RangeError);
  });
});

describe("led/ConsoleLedStrip", () => {
  it("redraws one line per published frame", () => {
    const chunks: string[] = [];
    const strip = new ConsoleLedStrip(3, { out: { write: (c: string) => chunks.push(c) }, glyph: "o" });
    strip.setLed(0, [255, 0, 0], false);
    expect(chunks.length).toBe(0);
    strip.show();
    strip.fill([0, 0, 0]);
    expect(chunks.length).toBe(2);
    expect(chunks[0].startsWith("\r")).toBe(true);
    expect(chunks[0].endsWith("\x1B[K")).toBe(true);
    expect(chunks[0].split("o").length - 1).toBe(3);
  });
});
