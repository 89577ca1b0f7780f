export { InkSurface } from "./InkSurface";
export type { InkSurfaceProps, InkSurfaceRef } from "./InkSurface";
export { TextFieldContextMenu } from "./TextFieldContextMenu";
export type { TextFieldContextMenuProps } from "./TextFieldContextMenu";
