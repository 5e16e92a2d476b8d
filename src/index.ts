export {
  RefreshLatch,
  type LatchConfig,
  type LatchPhase,
  type RefreshLatchOptions,
  type RefreshSink,
} from "./latch/refresh-latch.js";
export {
  createRefreshLatch,
  newRefreshLatch,
  newRefreshLatchWithDelay,
  newRefreshLatchWithMinShowTime,
  DEFAULT_DELAY_TIME,
  DEFAULT_MIN_SHOW_TIME,
  type LatchCollaborators,
} from "./latch/factory.js";
export {
  bindToLifecycle,
  type BindOptions,
  type LifecycleBinding,
  type LifecycleOwner,
} from "./latch/lifecycle.js";
export type {
  DiagnosticLogger,
  DiagnosticMeta,
  LatchTransition,
} from "./latch/diagnostics.js";
export type { ScheduledCommand, Scheduler } from "./scheduler/types.js";
export { TimerScheduler } from "./scheduler/timer-scheduler.js";
export { VirtualScheduler } from "./scheduler/virtual-scheduler.js";
export {
  InvalidConfigurationError,
  UseAfterDisposeError,
  ScenarioLoadError,
  type ConfigurationIssue,
} from "./errors.js";
export type { LatchOptions, LatchOptionsInput } from "./config/types.js";
export {
  simulateScenario,
  type SimulationResult,
  type SimulationSummary,
  type TraceEntry,
} from "./simulation/simulator.js";
export { parseDuration, formatDuration, type DurationInput } from "./utils/duration.js";
export { createLogger, createContextLogger } from "./utils/logger.js";
