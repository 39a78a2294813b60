let _requested = false;

/** Ask running builds to stop before their next phase or package. */
export function requestShutdown(): void {
  _requested = true;
}

export function isShutdownRequested(): boolean {
  return _requested;
}

/** For tests. */
export function resetShutdown(): void {
  _requested = false;
}

export const EXIT_INTERRUPTED = 130;
