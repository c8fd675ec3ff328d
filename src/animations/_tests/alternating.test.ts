import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fc from "fast-check";
import { AlternatingLedAnimation } from "../alternating";
import { NAMED_COLORS, type RgbTuple } from "../../led/color";
import { RecordingStrip } from "../../test-utils/recordingStrip";

/** Mémorise chaque trame publiée par show(). */
class FrameStrip extends RecordingStrip {
  readonly frames: RgbTuple[][] = [];

  override show(): void {
    super.show();
    this.frames.push(this.getFrame());
  }
}

function litIndices(frame: RgbTuple[]): number[] {
  const out: number[] = [];
  frame.forEach((rgb, i) => { if (rgb[0] + rgb[1] + rgb[2] > 0) out.push(i); });
  return out;
}

describe("animations/alternating", () => {
  beforeEach(() => { vi.useFakeTimers(); });
  afterEach(() => { vi.useRealTimers(); });

  it("one-shot shows the even phase then the odd phase, each as one frame", async () => {
    const strip = new FrameStrip(5);
    const anim = new AlternatingLedAnimation(strip, { color: NAMED_COLORS.cyan });
    const t0 = Date.now();
    const done = anim.start(undefined, true);
    await vi.runAllTimersAsync();
    await done;

    expect(strip.frames.map(litIndices)).toEqual([[0, 2, 4], [1, 3]]);
    expect(strip.calls.filter((c) => c.op === "set").every((c) => c.op === "set" && !c.immediate)).toBe(true);
    expect(strip.calls.filter((c) => c.op === "show").length).toBe(2);
    expect(strip.calls[0]).toEqual({ op: "fill", rgb: [0, 0, 0] });
    expect(strip.calls[strip.calls.length - 1]).toEqual({ op: "fill", rgb: [0, 0, 0] });
    expect(Date.now() - t0).toBe(1000);
    expect(strip.isDark()).toBe(true);
  });

  it("every LED is lit in exactly one of the two phases", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 40 }), async (n) => {
        const strip = new FrameStrip(n);
        const anim = new AlternatingLedAnimation(strip, { color: NAMED_COLORS.white, delayMs: 1 });
        const done = anim.start(undefined, true);
        await vi.runAllTimersAsync();
        await done;
        expect(strip.frames.length).toBe(2);
        const [even, odd] = strip.frames.map(litIndices);
        expect(even.filter((i) => odd.includes(i))).toEqual([]);
        expect([...even, ...odd].sort((a, b) => a - b)).toEqual(Array.from({ length: n }, (_, i) => i));
      }),
      { numRuns: 25 },
    );
  });

  it("keeps alternating until the timeout is observed", async () => {
    const strip = new FrameStrip(4);
    const anim = new AlternatingLedAnimation(strip, { color: NAMED_COLORS.red });
    const done = anim.start(1200);
    await vi.runAllTimersAsync();
    await done;
    expect(strip.frames.map(litIndices)).toEqual([[0, 2], [1, 3], [0, 2]]);
    expect(strip.isDark()).toBe(true);
  });

  it("stop() ends dark without waiting for the phase to finish", async () => {
    const strip = new FrameStrip(4);
    const anim = new AlternatingLedAnimation(strip, { color: NAMED_COLORS.red });
    const done = anim.start();
    await vi.advanceTimersByTimeAsync(700);
    const t = Date.now();
    anim.stop();
    await done;
    expect(Date.now()).toBe(t);
    expect(strip.frames.length).toBe(2);
    expect(strip.isDark()).toBe(true);
  });
});
