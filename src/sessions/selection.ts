/** Index of the selected session, or `null` when there is nothing to select. */
export type SelectedIndex = number | null;

/**
 * Where the selection lands after the session at `removedIndex` is removed and
 * `remaining` sessions are left.
 */
export function reclampSelection(selected: SelectedIndex, removedIndex: number, remaining: number): SelectedIndex {
  if (remaining <= 0) {
    return null;
  }

  if (selected === null) {
    return null;
  }

  if (selected > removedIndex) {
    return selected - 1;
  }

  return Math.min(selected, remaining - 1);
}

export class SessionSelection {
  private selected: SelectedIndex = null;

  get index(): SelectedIndex {
    return this.selected;
  }

  select(index: number, size: number): SelectedIndex {
    this.selected = size > 0 ? Math.min(Math.max(0, index), size - 1) : null;
    return this.selected;
  }

  sessionRemoved(removedIndex: number, remaining: number): SelectedIndex {
    this.selected = reclampSelection(this.selected, removedIndex, remaining);
    return this.selected;
  }
}
