// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/monitor/src/types/config.ts
// ChargeWatch configuration schema, validated with Zod. Persisted as JSON with
// snake_case keys; camelCase in code.

import { z } from "zod";

const intervalSeconds = z.number().int().positive();

export const chargeWatchConfigSchema = z
    .object({
        /** Low alert fires at or below this charge while discharging */
        minThreshold: z.number().int().min(1).max(98).default(21),
        /** High alert fires at or above this charge while charging */
        maxThreshold: z.number().int().min(2).max(99).default(81),
        /** Poll period in seconds while on AC */
        checkIntervalCharging: intervalSeconds.default(30),
        /** Poll period in seconds while on battery */
        checkIntervalDischarging: intervalSeconds.default(1800),
        /** Minimum spacing between two notifications, in seconds */
        notificationInterval: intervalSeconds.default(1800),
        /** Notification cap per charge phase */
        maxNotifications: z.number().int().min(0).default(3),
        useSimulator: z.boolean().default(false),
        debugEnabled: z.boolean().default(false),
    })
    .refine((c) => c.minThreshold < c.maxThreshold, {
        message: "min_threshold must be lower than max_threshold",
        path: ["minThreshold"],
    });

export type ChargeWatchConfig = z.infer<typeof chargeWatchConfigSchema>;

/** Keys of the persisted JSON document, in the order they are written. */
export const CONFIG_FILE_KEYS = [
    "min_threshold",
    "max_threshold",
    "check_interval_charging",
    "check_interval_discharging",
    "notification_interval",
    "max_notifications",
    "use_simulator",
    "debug_enabled",
] as const;

export type ConfigFileKey = (typeof CONFIG_FILE_KEYS)[number];

export const defaultConfig: ChargeWatchConfig = chargeWatchConfigSchema.parse({});

export function snakeToCamel(key: string): string {
    return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Convert a config into its on-disk shape. */
export function toConfigFile(config: ChargeWatchConfig): Record<ConfigFileKey, number | boolean> {
    return {
        min_threshold: config.minThreshold,
        max_threshold: config.maxThreshold,
        check_interval_charging: config.checkIntervalCharging,
        check_interval_discharging: config.checkIntervalDischarging,
        notification_interval: config.notificationInterval,
        max_notifications: config.maxNotifications,
        use_simulator: config.useSimulator,
        debug_enabled: config.debugEnabled,
    };
}

export function sameConfig(a: ChargeWatchConfig, b: ChargeWatchConfig): boolean {
    const fa = toConfigFile(a);
    const fb = toConfigFile(b);
    return CONFIG_FILE_KEYS.every((k) => fa[k] === fb[k]);
}
