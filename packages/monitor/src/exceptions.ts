// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for ChargeWatch. */

export class ChargeWatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChargeWatchError";
  }
}

export class ConfigurationError extends ChargeWatchError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The battery source could not produce a snapshot. */
export class BatteryReadError extends ChargeWatchError {
  constructor(
    public readonly source: string,
    cause?: unknown,
  ) {
    super(`Battery source '${source}' failed${cause ? `: ${describeError(cause)}` : ""}`, { cause });
    this.name = "BatteryReadError";
  }
}

export class NotificationError extends ChargeWatchError {
  constructor(
    public readonly sink: string,
    cause?: unknown,
  ) {
    super(`Notification sink '${sink}' failed${cause ? `: ${describeError(cause)}` : ""}`, { cause });
    this.name = "NotificationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
