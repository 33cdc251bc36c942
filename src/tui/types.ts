// Common types shared by the grid, elements and backends

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TerminalSize {
  rows: number;
  cols: number;
}

export type MouseAction =
  | 'left-click'
  | 'left-double-click'
  | 'right-click'
  | 'middle-click'
  | 'scroll-up'
  | 'scroll-down';

export interface KeyEvent {
  type: 'key';
  /** Normalized key name, see keys.ts */
  key: string;
}

export interface MouseEvent {
  type: 'mouse';
  x: number;
  y: number;
  action: MouseAction;
}

export interface ResizeEvent {
  type: 'resize';
  rows: number;
  cols: number;
}

export type InputEvent = KeyEvent | MouseEvent | ResizeEvent;

export interface TextAttributes {
  color: number;
  bold?: boolean;
  reverse?: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export type Alignment = 'top' | 'middle' | 'bottom';
