/**
 * Log List Model
 *
 * Owns the log items and the list state, and maps key presses to
 * navigation.
 */

import { isCtrlChar, isPlainKey, type KeyEvent } from "../../terminal/keys.js";
import type { LogListItem } from "./item.js";
import { LogListState } from "./state.js";

type ListAction = "next" | "previous";

interface KeyBinding {
  action: ListAction;
  matches: (event: KeyEvent) => boolean;
}

/** Down / Ctrl+N move down, Up / Ctrl+P move up */
export const LIST_KEY_BINDINGS: readonly KeyBinding[] = [
  { action: "next", matches: (event) => isPlainKey(event, "down") || isCtrlChar(event, "n") },
  { action: "previous", matches: (event) => isPlainKey(event, "up") || isCtrlChar(event, "p") },
];

export class LogListModel {
  readonly state: LogListState;
  private entries: LogListItem[] = [];

  constructor() {
    this.state = new LogListState();
    this.state.select(0);
  }

  get items(): readonly LogListItem[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  selected(): number | null {
    return this.state.selected();
  }

  /** Item under the selection, if the selection is in range */
  selectedItem(): LogListItem | undefined {
    const index = this.state.selected();
    return index === null ? undefined : this.entries[index];
  }

  isFocused(): boolean {
    return this.state.focused;
  }

  findText(): string {
    return this.state.query;
  }

  setFindText(query: string): void {
    this.state.query = query;
  }

  push(item: LogListItem): void {
    this.entries.push(item);
  }

  /** Remove every item and return to the initial state */
  clear(): void {
    this.entries = [];
    this.state.offset = 0;
    this.state.selectedIndex = 0;
  }

  select(index: number | null): void {
    this.state.select(index);
  }

  unselect(): void {
    this.state.select(null);
  }

  nextIfExist(): void {
    const index = this.state.selected();
    if (index === null || this.entries.length === 0) {
      return;
    }
    if (index < this.entries.length - 1) {
      this.state.select(index + 1);
    }
  }

  previousIfExist(): void {
    const index = this.state.selected();
    if (index !== null && index > 0) {
      this.state.select(index - 1);
    }
  }

  focus(): void {
    this.state.focused = true;
  }

  blur(): void {
    this.state.focused = false;
  }

  /**
   * Apply a key press.
   * @returns Whether the key is bound to a list action
   */
  onKey(event: KeyEvent): boolean {
    const binding = LIST_KEY_BINDINGS.find((candidate) => candidate.matches(event));
    if (!binding) {
      return false;
    }

    switch (binding.action) {
      case "next":
        this.nextIfExist();
        break;
      case "previous":
        this.previousIfExist();
        break;
    }
    return true;
  }
}
