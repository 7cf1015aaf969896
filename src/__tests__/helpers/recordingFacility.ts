/**
 * Recording Facility
 *
 * A MeasurementFacility that appends every call to `calls` in the order it
 * arrives, so tests can assert the exact begin/end sequence a timer produced.
 * `failOn` makes the matching call throw after it has been recorded.
 */
import type { MeasurementFacility } from '../../types.js';

export type RecordedCall = ['begin' | 'end', string];

export interface RecordingFacility extends MeasurementFacility {
  calls: RecordedCall[];
}

export function createRecordingFacility(failOn?: RecordedCall[0]): RecordingFacility {
  const calls: RecordedCall[] = [];

  const record = (kind: RecordedCall[0], label: string): void => {
    calls.push([kind, label]);
    if (kind === failOn) {
      throw new Error(`${kind} failed for ${label}`);
    }
  };

  return {
    calls,
    begin: (label) => record('begin', label),
    end: (label) => record('end', label),
  };
}
