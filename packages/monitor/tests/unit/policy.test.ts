// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { evaluateThrottle, remainingAfterNext } from "../../src/monitor/throttle.js";
import { adaptInterval, MIN_CHECK_INTERVAL_SECONDS } from "../../src/monitor/interval.js";

const policy = { maxNotifications: 3, notificationInterval: 60 };
const now = Date.UTC(2026, 0, 1, 12, 0, 0);

describe("evaluateThrottle", () => {
    it("allows the first notification of a phase", () => {
        expect(evaluateThrottle({ notificationsShown: 0, lastNotificationAt: null }, policy, now)).toBe("allow");
    });

    it("blocks once the cap is reached, whatever the spacing", () => {
        expect(evaluateThrottle({ notificationsShown: 3, lastNotificationAt: null }, policy, now)).toBe("quota-exhausted");
    });

    it("never allows anything with a cap of zero", () => {
        const none = { ...policy, maxNotifications: 0 };
        expect(evaluateThrottle({ notificationsShown: 0, lastNotificationAt: null }, none, now)).toBe("quota-exhausted");
    });

    it("allows the first notification of a phase close to the epoch", () => {
        expect(evaluateThrottle({ notificationsShown: 0, lastNotificationAt: null }, policy, 2_000)).toBe("allow");
    });

    it("enforces the spacing, inclusive at the boundary", () => {
        expect(evaluateThrottle({ notificationsShown: 1, lastNotificationAt: now - 59_999 }, policy, now)).toBe("too-soon");
        expect(evaluateThrottle({ notificationsShown: 1, lastNotificationAt: now - 60_000 }, policy, now)).toBe("allow");
    });
});

describe("remainingAfterNext", () => {
    it("counts what is left after the notification about to be shown", () => {
        expect(remainingAfterNext({ notificationsShown: 0, lastNotificationAt: null }, policy)).toBe(2);
        expect(remainingAfterNext({ notificationsShown: 2, lastNotificationAt: null }, policy)).toBe(0);
    });

    it("does not go negative", () => {
        expect(remainingAfterNext({ notificationsShown: 5, lastNotificationAt: null }, policy)).toBe(0);
    });
});

describe("adaptInterval", () => {
    it("shortens by one unit per point of distance from the threshold", () => {
        // unit = floor(600 / 20) = 30
        expect(adaptInterval(600, 20, 15)).toBe(450);
        expect(adaptInterval(600, 20, 25)).toBe(450);
    });

    it("leaves the interval alone at the threshold", () => {
        expect(adaptInterval(1800, 21, 21)).toBe(1800);
    });

    it("leaves the interval alone when the unit rounds down to zero", () => {
        expect(adaptInterval(30, 80, 90)).toBe(30);
    });

    it("stops at the minimum interval", () => {
        expect(MIN_CHECK_INTERVAL_SECONDS).toBe(10);
        expect(adaptInterval(100, 20, 0)).toBe(10);
        expect(adaptInterval(100, 20, 0, 30)).toBe(30);
    });

    it("never raises an interval that is already below the minimum", () => {
        // unit = floor(5 / 2) = 2, next = 1
        expect(adaptInterval(5, 2, 0)).toBe(5);
    });

    it("ignores a non-positive threshold", () => {
        expect(adaptInterval(600, 0, 50)).toBe(600);
    });

    it("never returns a non-positive interval", () => {
        for (let capacity = 0; capacity <= 100; capacity += 5) {
            expect(adaptInterval(1800, 21, capacity)).toBeGreaterThan(0);
        }
    });
});
