export { runtimeLogger } from "./runtimeShared";
export { MarketRegistry } from "./MarketRegistry";
export type { MarketRegistryOptions } from "./MarketRegistry";
export { AlertService } from "./AlertService";
export type { AlertServiceOptions } from "./AlertService";
export { NotificationDispatcher } from "./notify/NotificationDispatcher";
export type { DeliveryOutcome, NotificationSink } from "./notify/NotificationDispatcher";
export { AlertMonitor, DEFAULT_POLL_INTERVAL_MS } from "./monitor/AlertMonitor";
export type {
	AlertMonitorOptions,
	CycleReport,
	InstrumentOutcome,
	InstrumentStatus,
} from "./monitor/AlertMonitor";
