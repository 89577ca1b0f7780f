import { hasPrimaryModifier, isMacPlatform } from "../shared/platform";
import type { TextFieldState } from "./text-field-state";

export type KeyInput = {
  key: string;
  shiftKey: boolean;
  altKey: boolean;
  ctrlKey: boolean;
  metaKey: boolean;
};

export type ClipboardCommand = "copy" | "cut" | "paste";

export type EditCommand =
  | "undo"
  | "redo"
  | "select-all"
  | "delete-backward"
  | "delete-word-backward"
  | "delete-to-line-start"
  | "delete-forward"
  | "insert-newline"
  | "move-left"
  | "move-right"
  | "move-word-left"
  | "move-word-right"
  | "move-to-start"
  | "move-to-end";

export type KeyCommand = {
  type: EditCommand | ClipboardCommand;
  extend: boolean;
};

export type KeyBindingOptions = {
  singleLine?: boolean;
};

export function isClipboardCommand(
  type: KeyCommand["type"],
): type is ClipboardCommand {
  return type === "copy" || type === "cut" || type === "paste";
}

/**
 * Maps a key press to an editing command. Printable characters are not
 * handled here; they arrive through the input bridge.
 */
export function resolveKeyCommand(
  event: KeyInput,
  options: KeyBindingOptions = {},
): KeyCommand | null {
  const mac = isMacPlatform();
  const cmdOrCtrl = hasPrimaryModifier(event);
  const isLineModifier = mac && event.metaKey;
  const isWordModifier = mac ? event.altKey : event.ctrlKey;
  const extend = event.shiftKey;
  const command = (type: KeyCommand["type"]): KeyCommand => ({ type, extend });
  const key = event.key.length === 1 ? event.key.toLowerCase() : event.key;

  if (cmdOrCtrl) {
    switch (key) {
      case "z":
        return command(event.shiftKey ? "redo" : "undo");
      case "y":
        return mac ? null : command("redo");
      case "a":
        return command("select-all");
      case "c":
        return command("copy");
      case "x":
        return command("cut");
      case "v":
        return command("paste");
    }
  }

  switch (key) {
    case "Backspace":
      if (isLineModifier) {
        return command("delete-to-line-start");
      }
      return command(isWordModifier ? "delete-word-backward" : "delete-backward");
    case "Delete":
      return command("delete-forward");
    case "Enter":
      return options.singleLine ? null : command("insert-newline");
    case "ArrowLeft":
      if (isLineModifier) {
        return command("move-to-start");
      }
      return command(isWordModifier ? "move-word-left" : "move-left");
    case "ArrowRight":
      if (isLineModifier) {
        return command("move-to-end");
      }
      return command(isWordModifier ? "move-word-right" : "move-right");
    case "Home":
      return command("move-to-start");
    case "End":
      return command("move-to-end");
  }
  return null;
}

/** Applies a non-clipboard command. Returns false when nothing changed. */
export function applyEditCommand(
  field: TextFieldState,
  command: { type: EditCommand; extend: boolean },
): boolean {
  const before = field.value;
  switch (command.type) {
    case "undo":
      return field.undo();
    case "redo":
      return field.redo();
    case "select-all":
      field.selectAll();
      break;
    case "delete-backward":
      return field.deleteBackward();
    case "delete-word-backward":
      return field.deleteWordBackward();
    case "delete-to-line-start":
      return field.deleteToLineStart();
    case "delete-forward":
      return field.deleteForward();
    case "insert-newline":
      field.insertText("\n");
      break;
    case "move-left":
      field.moveCursorLeft(command.extend);
      break;
    case "move-right":
      field.moveCursorRight(command.extend);
      break;
    case "move-word-left":
      field.moveCursorLeftByWord(command.extend);
      break;
    case "move-word-right":
      field.moveCursorRightByWord(command.extend);
      break;
    case "move-to-start":
      field.moveCursorToStart(command.extend);
      break;
    case "move-to-end":
      field.moveCursorToEnd(command.extend);
      break;
  }
  return field.value !== before;
}
