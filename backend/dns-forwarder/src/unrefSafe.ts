/**
 * Calls `unref()` on timers/handles without letting a missing or throwing `unref` escape.
 */
export function unrefBestEffort(handle: { unref?: () => unknown } | null | undefined): void {
  try {
    handle?.unref?.();
  } catch {
    // ignore: the handle is already gone
  }
}
