function detectPlatform(): "mac" | "windows" | "linux" {
  if (typeof navigator === "undefined") {
    return "linux";
  }
  const platform = navigator.platform;
  if (/Mac|iPhone|iPad|iPod/.test(platform)) {
    return "mac";
  }
  if (/Win/.test(platform)) {
    return "windows";
  }
  return "linux";
}

// Checked per call: tests override `navigator.platform`.
export function isMacPlatform(): boolean {
  return detectPlatform() === "mac";
}

export type ModifierState = {
  metaKey: boolean;
  ctrlKey: boolean;
};

/** Cmd on macOS, Ctrl elsewhere. */
export function hasPrimaryModifier(event: ModifierState): boolean {
  return isMacPlatform() ? event.metaKey : event.ctrlKey;
}
