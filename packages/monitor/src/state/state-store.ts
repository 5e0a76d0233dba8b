// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";

import { DEFAULT_CONFIG_DIR } from "../config/store.js";
import { ChargeWatchError, describeError } from "../exceptions.js";

/** The part of the monitor state kept across restarts. */
export interface PersistedMonitorState {
    lastLevel: number;
    lastCharging: boolean;
    notificationsShown: number;
    lastNotificationAt: number | null; // epoch ms, null = none in this phase
}

export interface MonitorStateStore {
    load(): PersistedMonitorState | null;
    save(state: PersistedMonitorState): void;
}

const persistedStateSchema = z.object({
    last_level: z.number().int().min(-1).max(100),
    last_charging: z.boolean(),
    notifications_shown: z.number().int().min(0),
    last_notification_at: z.number().int().nullable(),
});

export const DEFAULT_STATE_PATH = join(DEFAULT_CONFIG_DIR, "state.json");

/** One small JSON document, replaced atomically on every save. */
export class JsonMonitorStateStore implements MonitorStateStore {
    readonly path: string;

    constructor(statePath: string = DEFAULT_STATE_PATH) {
        this.path = statePath;
        mkdirSync(dirname(this.path), { recursive: true });
    }

    /** @throws ChargeWatchError when the file exists but cannot be used */
    load(): PersistedMonitorState | null {
        if (!existsSync(this.path)) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.path, "utf8"));
        } catch (err) {
            throw new ChargeWatchError(`Failed to read monitor state at '${this.path}': ${describeError(err)}`, { cause: err });
        }

        const result = persistedStateSchema.safeParse(raw);
        if (!result.success) {
            throw new ChargeWatchError(`Monitor state at '${this.path}' is malformed`, { cause: result.error });
        }

        const row = result.data;
        return {
            lastLevel: row.last_level,
            lastCharging: row.last_charging,
            notificationsShown: row.notifications_shown,
            lastNotificationAt: row.last_notification_at,
        };
    }

    save(state: PersistedMonitorState): void {
        const document = {
            last_level: state.lastLevel,
            last_charging: state.lastCharging,
            notifications_shown: state.notificationsShown,
            last_notification_at: state.lastNotificationAt,
            updated_at: new Date().toISOString(),
        };

        const tmpPath = `${this.path}.tmp`;
        try {
            writeFileSync(tmpPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
            renameSync(tmpPath, this.path);
        } catch (err) {
            rmSync(tmpPath, { force: true });
            throw new ChargeWatchError(`Failed to save monitor state to '${this.path}': ${describeError(err)}`, { cause: err });
        }
    }
}
