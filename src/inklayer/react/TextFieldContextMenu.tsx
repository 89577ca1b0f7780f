import type { MouseEvent as ReactMouseEvent } from "react";
import type { LucideIcon } from "lucide-react";
import { ClipboardPaste, Copy, Scissors, TextSelect } from "lucide-react";
import type { ContextMenuAction, ContextMenuState } from "../fields/field-manager";

const ACTION_LABELS: Record<ContextMenuAction, string> = {
  cut: "Cut",
  copy: "Copy",
  paste: "Paste",
  "select-all": "Select all",
};

const ACTION_ICONS: Record<ContextMenuAction, LucideIcon> = {
  cut: Scissors,
  copy: Copy,
  paste: ClipboardPaste,
  "select-all": TextSelect,
};

export type TextFieldContextMenuProps = {
  menu: ContextMenuState;
  onAction: (action: ContextMenuAction) => void;
  className?: string;
};

function cx(...parts: Array<string | undefined | null | false>) {
  return parts.filter(Boolean).join(" ");
}

// Buttons must not take focus from the input bridge.
function keepFocus(event: ReactMouseEvent<HTMLDivElement>) {
  event.preventDefault();
}

export function TextFieldContextMenu({
  menu,
  onAction,
  className,
}: TextFieldContextMenuProps) {
  return (
    <div
      className={cx("inklayer-context-menu", className)}
      role="menu"
      style={{
        position: "absolute",
        top: menu.position.y,
        left: menu.position.x,
        transform: "translateX(-50%)",
        display: "flex",
        gap: 4,
        pointerEvents: "auto",
      }}
      onMouseDown={keepFocus}
    >
      {menu.actions.map((action) => {
        const Icon = ACTION_ICONS[action];
        return (
          <button
            key={action}
            type="button"
            role="menuitem"
            className="inklayer-context-menu-item"
            title={ACTION_LABELS[action]}
            aria-label={ACTION_LABELS[action]}
            onClick={() => onAction(action)}
          >
            <Icon className="inklayer-context-menu-icon" size={16} />
          </button>
        );
      })}
    </div>
  );
}
