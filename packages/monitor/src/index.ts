// © 2026 LearnHubPlay BV. All rights reserved.
// packages/monitor/src/index.ts: public API for @chargewatch/monitor

export { ChargeWatch } from "./chargewatch.js";
export { BatteryMonitor } from "./monitor/monitor.js";
export { evaluateThrottle, remainingAfterNext } from "./monitor/throttle.js";
export { adaptInterval, MIN_CHECK_INTERVAL_SECONDS } from "./monitor/interval.js";
export { BatterySimulator } from "./simulator/simulator.js";
export { SimulatedBatterySource } from "./sources/simulated.js";
export { SystemBatterySource } from "./sources/system.js";
export { ConfigStore, DEFAULT_CONFIG_PATH } from "./config/store.js";
export { ConfigWatcher } from "./config/watcher.js";
export { JsonMonitorStateStore, DEFAULT_STATE_PATH } from "./state/state-store.js";
export {
    ConsoleNotificationSink,
    FanoutNotificationSink,
    LogNotificationSink,
    formatAlertMessage,
} from "./notify/sinks.js";
export { formatStatusReport, formatDuration } from "./report/status-report.js";
export { createLogger } from "./logger.js";
export { calculateHealthPct, createSnapshot } from "./types/battery.js";
export {
    CONFIG_FILE_KEYS,
    chargeWatchConfigSchema,
    defaultConfig,
    snakeToCamel,
    toConfigFile,
} from "./types/config.js";
export {
    BatteryReadError,
    ChargeWatchError,
    ConfigurationError,
    NotificationError,
    describeError,
} from "./exceptions.js";
export type { ChargeWatchOptions } from "./chargewatch.js";
export type { BatteryMonitorOptions, MonitorMode, MonitorState } from "./monitor/monitor.js";
export type { ThrottlePolicy, ThrottleState, ThrottleVerdict } from "./monitor/throttle.js";
export type { SimulatorLimits, SimulatorOptions, SimulatorPhase, SimulatorState } from "./simulator/simulator.js";
export type { ConfigSaver } from "./config/store.js";
export type { ConfigWatcherOptions } from "./config/watcher.js";
export type { MonitorStateStore, PersistedMonitorState } from "./state/state-store.js";
export type { AlertKind, NotificationSink } from "./notify/sinks.js";
export type { Logger, LogLevel, LoggerOptions, ModuleName } from "./logger.js";
export type { BatterySnapshot, BatterySource } from "./types/battery.js";
export type { ChargeWatchConfig, ConfigFileKey } from "./types/config.js";
