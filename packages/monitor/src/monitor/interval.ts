// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/monitor/interval.ts
// Interval adaptation: shortens the poll period as the charge moves past the
// active threshold.
//
//   unit = floor(interval / threshold)      seconds per percentage point
//   gap  = |capacity - threshold|
//   next = interval - unit * gap            clamped to the floor below

/** Adaptation never takes a poll period below this many seconds. */
export const MIN_CHECK_INTERVAL_SECONDS = 10;

export function adaptInterval(
    intervalSeconds: number,
    threshold: number,
    capacity: number,
    floorSeconds: number = MIN_CHECK_INTERVAL_SECONDS,
): number {
    if (threshold <= 0) return intervalSeconds;

    const unit = Math.floor(intervalSeconds / threshold);
    const gap = Math.abs(capacity - threshold);
    const next = intervalSeconds - unit * gap;

    // An interval already configured below the floor is left where it is,
    // never raised.
    const floor = Math.min(floorSeconds, intervalSeconds);
    return Math.max(floor, next);
}
