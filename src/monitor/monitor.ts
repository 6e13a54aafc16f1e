/**
 * Change-detection monitor
 *
 * Reads every selected control once for a baseline, then samples them on a
 * fixed interval and records only transitions.
 *
 * Pass lifecycle:
 * 1. Top of pass: stop if the signal has fired
 * 2. Read every control in selection order
 * 3. Compare each successful read against the control's last value
 * 4. Append at most one record per control
 * 5. Report failures, then sleep (abortable)
 *
 * A pass that has started always completes, so cancellation never leaves a
 * half-recorded pass.
 */

import { AuthenticationError } from '$types/errors';

import { describeValue, normalizeValue, toMonitoredControls, valuesEqual } from './helpers';

import type { ControlValue } from '$types/common';
import type { ChangeRecord } from '@records';
import type {
  ChangeMonitor,
  MonitorDependencies,
  MonitoredControl,
  MonitorOptions,
  MonitorSelection,
  MonitorState,
  MonitorSummary
} from './types';

export const DEFAULT_MONITOR_OPTIONS: Readonly<MonitorOptions> = {
  pollIntervalMs: 1000,
  statsEvery: 100,
  unassignedRoomLabel: 'No room'
};

interface ReadFailure {
  control: MonitoredControl;
  error: unknown;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create a monitor for a fixed selection
 *
 * @param selection - Selected entries and their catalog
 * @param deps - Reader, sink, logger, clock and sleep
 * @param options - Overrides for DEFAULT_MONITOR_OPTIONS
 *
 * @example
 * ```typescript
 * const monitor = createChangeMonitor(
 *   { catalog, entries },
 *   { reader: client, sink, logger, clock: systemClock, sleep },
 *   { pollIntervalMs: 1000 }
 * );
 * const summary = await monitor.run(abortController.signal);
 * ```
 */
export function createChangeMonitor(
  selection: MonitorSelection,
  deps: MonitorDependencies,
  options: Partial<MonitorOptions> = {}
): ChangeMonitor {
  const settings: MonitorOptions = { ...DEFAULT_MONITOR_OPTIONS, ...options };
  const { reader, sink, logger, clock } = deps;

  async function run(signal: AbortSignal): Promise<MonitorSummary> {
    const controls = toMonitoredControls(selection, settings.unassignedRoomLabel);
    const states = new Map<string, MonitorState>();
    const startedAt = clock();
    let checksPerformed = 0;
    let changesRecorded = 0;
    let baselineRecords = 0;
    let failedReads = 0;
    let unreachable = false;

    async function read(control: MonitoredControl): Promise<ControlValue | ReadFailure> {
      try {
        return await reader.fetchCurrentValue(control.id);
      } catch (err) {
        if (err instanceof AuthenticationError) {
          throw err;
        }
        failedReads++;
        return { control: control, error: err };
      }
    }

    async function observe(control: MonitoredControl, raw: ControlValue): Promise<void> {
      const timestamp = clock();
      const value = normalizeValue(raw);
      const state = states.get(control.id);

      if (!state) {
        await sink.append(createRecord(control, 'baseline', timestamp, raw, null));
        states.set(control.id, { value: value, raw: raw, observedAt: timestamp });
        baselineRecords++;
        logger.debug('Baseline ' + control.name + ' = ' + describeValue(raw));
        return;
      }

      if (valuesEqual(state.value, value)) {
        state.observedAt = timestamp;
        return;
      }

      await sink.append(createRecord(control, 'change', timestamp, raw, state.raw));
      const previous = state.raw;
      state.value = value;
      state.raw = raw;
      state.observedAt = timestamp;
      changesRecorded++;
      logger.info(control.name + ': ' + describeValue(previous) + ' -> ' + describeValue(raw));
    }

    async function pass(): Promise<void> {
      const failures: ReadFailure[] = [];

      for (const control of controls) {
        const result = await read(control);
        if (typeof result === 'object') {
          failures.push(result);
        } else {
          await observe(control, result);
        }
      }

      reportFailures(failures);
    }

    function reportFailures(failures: ReadFailure[]): void {
      const allFailed = controls.length > 0 && failures.length === controls.length;

      if (allFailed) {
        if (!unreachable) {
          unreachable = true;
          logger.critical(
            'Controller unreachable: all ' + controls.length + ' reads failed (' +
            errorMessage(failures[0].error) + '). Retrying every ' + settings.pollIntervalMs + 'ms'
          );
        }
        return;
      }

      if (unreachable) {
        unreachable = false;
        logger.info('Controller reachable again');
      }

      for (const failure of failures) {
        logger.warning(
          'Read failed for ' + failure.control.name + ' (' + failure.control.id + '): ' + errorMessage(failure.error)
        );
      }
    }

    function createRecord(
      control: MonitoredControl,
      kind: ChangeRecord['kind'],
      timestamp: Date,
      newValue: ControlValue,
      previousValue: ControlValue | null
    ): ChangeRecord {
      return Object.freeze({
        kind: kind,
        timestamp: timestamp,
        entityId: control.id,
        name: control.name,
        typeTag: control.typeTag,
        roomName: control.roomName,
        newValue: newValue,
        previousValue: previousValue
      });
    }

    async function closeAfterFailure(): Promise<void> {
      try {
        await sink.close();
      } catch (closeErr) {
        logger.warning('Record sink did not close cleanly: ' + errorMessage(closeErr));
      }
    }

    try {
      if (!signal.aborted) {
        logger.info('Capturing baseline for ' + controls.length + ' controls');
        await pass();
        logger.info('Baseline captured (' + baselineRecords + ' records)');
      }

      while (!signal.aborted) {
        const waited = await deps.sleep(settings.pollIntervalMs, signal);
        if (!waited || signal.aborted) {
          break;
        }

        await pass();
        checksPerformed++;

        if (settings.statsEvery > 0 && checksPerformed % settings.statsEvery === 0) {
          logger.info('Checks: ' + checksPerformed + ' | Changes recorded: ' + changesRecorded);
        }
      }
    } catch (err) {
      logger.critical('Monitoring stopped: ' + errorMessage(err));
      await closeAfterFailure();
      states.clear();
      throw err;
    }

    await sink.close();
    states.clear();

    const summary: MonitorSummary = {
      checksPerformed: checksPerformed,
      changesRecorded: changesRecorded,
      baselineRecords: baselineRecords,
      failedReads: failedReads,
      startedAt: startedAt,
      stoppedAt: clock()
    };

    logger.info(
      'Monitoring finished: ' + summary.checksPerformed + ' checks, ' +
      summary.changesRecorded + ' changes recorded, ' + summary.failedReads + ' failed reads'
    );

    return summary;
  }

  return {
    run: run
  };
}
