/**
 * Signal handling while the installer runs.
 *
 * Ctrl+C reaches both ghreq and the installer (same process group). Without
 * a listener Node exits at once and the rendered file, which holds the
 * token, would stay on disk. The guard runs a cleanup callback on the first
 * signal and then detaches, so a second Ctrl+C falls back to the default
 * behaviour and kills ghreq.
 */

import { constants } from "node:os";

export const CLEANUP_SIGNALS = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

export type CleanupSignal = (typeof CLEANUP_SIGNALS)[number];

type SignalListener = (signal: NodeJS.Signals) => void;

/** Subset of `process` the guard listens on. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  removeListener(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface SignalGuard {
  /** First signal received while attached, if any */
  readonly received: CleanupSignal | null;
  dispose(): void;
}

/**
 * Conventional exit status for a process ended by a signal: 128 + signo.
 */
export function signalExitCode(signal: CleanupSignal): number {
  return 128 + constants.signals[signal];
}

/**
 * Listen for SIGINT, SIGTERM and SIGHUP and call onSignal once.
 */
export function guardSignals(source: SignalSource, onSignal: (signal: CleanupSignal) => void): SignalGuard {
  let received: CleanupSignal | null = null;
  let attached = true;

  const listeners = CLEANUP_SIGNALS.map((signal) => {
    const listener: SignalListener = () => {
      if (received === null) {
        received = signal;
        dispose();
        onSignal(signal);
      }
    };
    source.on(signal, listener);
    return { signal, listener };
  });

  function dispose(): void {
    if (!attached) {return;}
    attached = false;
    for (const { signal, listener } of listeners) {
      source.removeListener(signal, listener);
    }
  }

  return {
    get received() {
      return received;
    },
    dispose,
  };
}
