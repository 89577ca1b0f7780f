import { describe, expect, it, vi } from "vitest";
import { ChangeEmitter } from "./change-emitter";

describe("ChangeEmitter", () => {
  it("bumps the version and calls listeners on emit", () => {
    const emitter = new ChangeEmitter();
    const listener = vi.fn();
    emitter.subscribe(listener);
    emitter.emit();
    emitter.emit();
    expect(emitter.version).toBe(2);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it("stops calling a listener after it unsubscribes", () => {
    const emitter = new ChangeEmitter();
    const listener = vi.fn();
    const unsubscribe = emitter.subscribe(listener);
    unsubscribe();
    emitter.emit();
    expect(listener).not.toHaveBeenCalled();
  });
});
