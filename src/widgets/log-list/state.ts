/**
 * Log List State
 *
 * Cursor and viewport state that survives between frames.
 */

export class LogListState {
  /** Index of the first item in the viewport window */
  offset = 0;
  /** Selected item index, or null when nothing is selected */
  selectedIndex: number | null = null;
  focused = false;
  /** Active search query */
  query = "";

  selected(): number | null {
    return this.selectedIndex;
  }

  /**
   * Select an index without bounds checking; the renderer clamps it.
   * Clearing the selection scrolls back to the top.
   */
  select(index: number | null): void {
    this.selectedIndex = index;
    if (index === null) {
      this.offset = 0;
    }
  }
}
