// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/monitor/throttle.ts
// Notification throttle gate. A threshold crossing becomes a notification only
// when both hold:
//   1. notificationsShown < maxNotifications       (cap per charge phase)
//   2. now - lastNotificationAt >= notificationInterval
// lastNotificationAt is null at the start of a phase, so (2) passes for the
// first notification of every phase, whatever the clock says.

export interface ThrottleState {
    notificationsShown: number;
    /** Epoch ms; null = no notification in this phase */
    lastNotificationAt: number | null;
}

export interface ThrottlePolicy {
    maxNotifications: number;
    /** Seconds */
    notificationInterval: number;
}

export type ThrottleVerdict = "allow" | "quota-exhausted" | "too-soon";

export function evaluateThrottle(state: ThrottleState, policy: ThrottlePolicy, nowMs: number): ThrottleVerdict {
    if (state.notificationsShown >= policy.maxNotifications) return "quota-exhausted";
    if (state.lastNotificationAt !== null && nowMs - state.lastNotificationAt < policy.notificationInterval * 1_000) {
        return "too-soon";
    }
    return "allow";
}

/** Notifications still available in this phase after the one about to be shown. */
export function remainingAfterNext(state: ThrottleState, policy: ThrottlePolicy): number {
    return Math.max(0, policy.maxNotifications - state.notificationsShown - 1);
}
