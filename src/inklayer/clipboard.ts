export type ClipboardAdapter = {
  readText: () => Promise<string>;
  writeText: (text: string) => Promise<void>;
};

/** Clipboard kept in memory, for hosts without clipboard access and tests. */
export function createMemoryClipboard(initial = ""): ClipboardAdapter {
  let contents = initial;
  return {
    async readText() {
      return contents;
    },
    async writeText(text) {
      contents = text;
    },
  };
}

/**
 * Uses `navigator.clipboard` when the page may, mirroring every write into
 * memory so a denied read still pastes what this surface copied.
 */
export function createBrowserClipboard(): ClipboardAdapter {
  const fallback = createMemoryClipboard();
  const systemClipboard =
    typeof navigator !== "undefined" ? navigator.clipboard : undefined;
  if (!systemClipboard) {
    return fallback;
  }
  return {
    async readText() {
      try {
        return await systemClipboard.readText();
      } catch (error) {
        console.warn("[inklayer] Clipboard read failed, using local copy", error);
        return fallback.readText();
      }
    },
    async writeText(text) {
      await fallback.writeText(text);
      try {
        await systemClipboard.writeText(text);
      } catch (error) {
        console.warn("[inklayer] Clipboard write failed, kept local copy", error);
      }
    },
  };
}
