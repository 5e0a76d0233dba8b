// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { BatterySimulator } from "../simulator/simulator.js";
import type { BatterySnapshot, BatterySource } from "../types/battery.js";

/** Feeds the simulator with the monitor's live notification count on every poll. */
export class SimulatedBatterySource implements BatterySource {
    readonly name = "simulator";

    constructor(
        private readonly simulator: BatterySimulator,
        private readonly notificationsShown: () => number,
    ) { }

    async poll(): Promise<BatterySnapshot> {
        return this.simulator.next(this.notificationsShown());
    }
}
