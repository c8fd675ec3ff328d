import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BreatheLedAnimation } from "../breathe";
import { NAMED_COLORS, type RgbTuple } from "../../led/color";
import { AnimationError } from "../../errors";
import { RecordingStrip } from "../../test-utils/recordingStrip";

function reds(fills: RgbTuple[]): number[] {
  return fills.map((rgb) => rgb[0]);
}

describe("animations/breathe", () => {
  beforeEach(() => { vi.useFakeTimers(); });
  afterEach(() => { vi.useRealTimers(); });

  it("one-shot ramps up to full brightness, back down to zero, then turns off", async () => {
    const strip = new RecordingStrip(3);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.red });
    const t0 = Date.now();
    const done = anim.start(undefined, true);
    await vi.runAllTimersAsync();
    await done;

    const fills = strip.fills();
    expect(fills.length).toBe(41);
    const r = reds(fills);
    for (let i = 1; i < 20; i++) expect(r[i]).toBeGreaterThan(r[i - 1]);
    expect(r[0]).toBe(13);
    expect(r[19]).toBe(255);
    for (let i = 20; i < 40; i++) expect(r[i]).toBeLessThan(r[i - 1]);
    expect(r[39]).toBe(0);
    expect(fills[40]).toEqual([0, 0, 0]);
    expect(fills.every((rgb) => rgb[1] === 0 && rgb[2] === 0)).toBe(true);
    expect(Date.now() - t0).toBe(40 * 50);
    expect(strip.isDark()).toBe(true);
  });

  it("timeout is checked once per frame and may overrun by one step", async () => {
    const strip = new RecordingStrip(2);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.white });
    const done = anim.start(500);
    await vi.runAllTimersAsync();
    await done;
    // 11 trames (550ms > 500ms) puis extinction
    expect(strip.fills().length).toBe(12);
    expect(strip.isDark()).toBe(true);
  });

  it("stop() interrupts the current step immediately", async () => {
    const strip = new RecordingStrip(2);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.blue });
    const done = anim.start(60_000);
    await vi.advanceTimersByTimeAsync(175);
    expect(anim.isRunning).toBe(true);
    const t = Date.now();
    anim.stop();
    await done;
    expect(Date.now()).toBe(t);
    expect(strip.fills().length).toBe(5);
    expect(strip.isDark()).toBe(true);
    expect(anim.isRunning).toBe(false);
  });

  it("a stop() issued while idle does not affect the next start", async () => {
    const strip = new RecordingStrip(1);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.red });
    anim.stop();
    const done = anim.start(undefined, true);
    await vi.runAllTimersAsync();
    await done;
    expect(strip.fills().length).toBe(41);
  });

  it("restarting after a stop behaves like a fresh instance", async () => {
    const strip = new RecordingStrip(1);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.red });
    const first = anim.start();
    await vi.advanceTimersByTimeAsync(120);
    anim.stop();
    await first;
    strip.calls.length = 0;

    const second = anim.start(undefined, true);
    await vi.runAllTimersAsync();
    await second;
    expect(strip.fills().length).toBe(41);
    expect(strip.fills()[0]).toEqual([13, 0, 0]);
  });

  it("honours custom step and delay", async () => {
    const strip = new RecordingStrip(1);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.red, step: 0.25, stepDelayMs: 10 });
    const t0 = Date.now();
    const done = anim.start(undefined, true);
    await vi.runAllTimersAsync();
    await done;
    expect(reds(strip.fills())).toEqual([64, 128, 191, 255, 191, 128, 64, 0, 0]);
    expect(Date.now() - t0).toBe(80);
  });

  it("rejects a concurrent start on the same instance", async () => {
    const strip = new RecordingStrip(1);
    const anim = new BreatheLedAnimation(strip, { color: NAMED_COLORS.red });
    const first = anim.start();
    await expect(anim.start()).rejects.toThrow(AnimationError);
    anim.stop();
    await first;
  });

  it("propagates device errors unchanged", async () => {
    class FaultyStrip extends RecordingStrip {
      override fill(): void {
        throw new Error("bus fault");
      }
    }
    const anim = new BreatheLedAnimation(new FaultyStrip(2), { color: NAMED_COLORS.red });
    await expect(anim.start(undefined, true)).rejects.toThrow("bus fault");
    expect(anim.isRunning).toBe(false);
  });
});
