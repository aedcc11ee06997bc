/**
 * Wall-clock time and blocking waits behind one seam.
 *
 * Rate-limit backoff and scheduler intervals sleep for hours or days, so
 * everything that waits takes a WallClock and tests substitute a fake.
 */

export type Sleep = (ms: number) => Promise<void>;

export interface WallClock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

// setTimeout fires immediately for delays above a signed 32-bit int
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const sleep: Sleep = async (ms) => {
  let remaining = Math.max(0, ms);
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
};

export class SystemClock implements WallClock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return sleep(ms);
  }
}
