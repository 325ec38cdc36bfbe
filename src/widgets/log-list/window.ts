/**
 * Viewport Window
 *
 * Decides which contiguous slice of variable-height items is visible.
 * The window starts from the previous frame's offset and only slides as
 * far as needed to contain the selection, so repeated frames with the
 * same selection keep the same scroll position.
 */

export interface ViewportWindow {
  /** First item in the window */
  start: number;
  /** One past the last item in the window */
  end: number;
}

export interface WindowInput {
  /** Number of items; must be positive */
  count: number;
  /** Rows of item `index` at the current width */
  heightOf: (index: number) => number;
  /** Offset persisted from the previous frame */
  offset: number;
  /** Selected index, or null for none */
  selected: number | null;
  /** Rows available */
  listHeight: number;
}

/**
 * Clamp a possibly stale selection into the item range.
 * Callers must check `count > 0` first.
 */
export function clampSelection(selected: number | null, count: number): number {
  return Math.max(0, Math.min(selected ?? 0, count - 1));
}

export function computeWindow({ count, heightOf, offset, selected, listHeight }: WindowInput): ViewportWindow {
  if (count <= 0) {
    return { start: 0, end: 0 };
  }

  let start = Math.max(0, Math.min(offset, count - 1));
  let end = start;
  let rows = 0;

  // Fill forward from the offset. A trailing item that only partly fits
  // is still part of the window and gets clipped when drawn. It is counted
  // at its full height on purpose: counting only its visible rows lets the
  // slide below stop with the selection under the bottom edge.
  for (let index = start; index < count; index++) {
    const itemHeight = heightOf(index);
    if (rows + itemHeight > listHeight) {
      if (rows < listHeight) {
        end++;
        rows += itemHeight;
      }
      break;
    }
    end++;
    rows += itemHeight;
  }

  const target = clampSelection(selected, count);

  // Selection below the window: it becomes the bottom item
  while (target >= end) {
    rows += heightOf(end);
    end++;
    while (rows > listHeight && start < target) {
      rows -= heightOf(start);
      start++;
    }
  }

  // Selection above the window: it becomes the top item
  while (target < start) {
    start--;
    rows += heightOf(start);
    while (rows > listHeight && end - 1 > target) {
      end--;
      rows -= heightOf(end);
    }
  }

  return { start, end };
}
