export { createChangeMonitor, DEFAULT_MONITOR_OPTIONS } from './monitor';
export { describeValue, normalizeValue, toMonitoredControls, valuesEqual } from './helpers';

export type {
  ChangeMonitor,
  MonitorDependencies,
  MonitoredControl,
  MonitorOptions,
  MonitorSelection,
  MonitorState,
  MonitorSummary,
  NormalizedValue,
  StateReader
} from './types';
