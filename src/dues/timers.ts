import { type TimerHandle, type TimerService } from "./types";

// Maximum delay for setTimeout (24 hours to avoid 32-bit overflow)
const MAX_DELAY_MS = 1000 * 60 * 60 * 24;

/**
 * Timer service backed by setTimeout, chaining chunks for long delays.
 */
export class NodeTimerService implements TimerService {
  runOnce(callback: () => void | Promise<void>, delaySeconds: number): TimerHandle {
    const fireAtMs = Date.now() + Math.max(0, delaySeconds) * 1000;
    let handle: ReturnType<typeof setTimeout> | null = null;
    let cancelled = false;

    const scheduleChunk = () => {
      const remainingMs = fireAtMs - Date.now();

      if (remainingMs <= 0) {
        handle = null;
        runCallback(callback);
        return;
      }

      handle = setTimeout(scheduleChunk, Math.min(remainingMs, MAX_DELAY_MS));
    };

    // Start the timeout chain
    handle = setTimeout(
      scheduleChunk,
      Math.min(Math.max(0, fireAtMs - Date.now()), MAX_DELAY_MS),
    );

    return {
      cancel: () => {
        if (cancelled) {
          return;
        }
        cancelled = true;
        if (handle) {
          clearTimeout(handle);
          handle = null;
        }
      },
    };
  }
}

function runCallback(callback: () => void | Promise<void>): void {
  try {
    const result = callback();
    if (result instanceof Promise) {
      result.catch((e: unknown) => {
        console.error(`[Timers] Callback failed: ${e}`);
      });
    }
  } catch (e) {
    console.error(`[Timers] Callback failed: ${e}`);
  }
}
