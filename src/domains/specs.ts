/**
 * Static health domain definitions. Candidate tables and columns are tried in
 * the order listed; the first table that satisfies every required field wins.
 */

import type { DomainSpec, FieldSpec } from '../types/index.js';

const SOURCE_FIELD: FieldSpec = {
  field: 'source',
  candidates: ['source', 'data_source', 'origin'],
  required: false,
};

export const DOMAIN_SPECS: readonly DomainSpec[] = [
  {
    id: 'weight',
    label: 'Weight',
    unit: 'kg',
    tables: ['measurements_weight', 'weight', 'weight_measurements', 'body_weight'],
    fields: [
      { field: 'timestamp', candidates: ['date', 'measured_at', 'timestamp', 'created_at', 'time'], required: true },
      { field: 'value', candidates: ['weight_kg', 'weight', 'value', 'kg'], required: true },
      SOURCE_FIELD,
    ],
    timestampField: 'timestamp',
    valueField: 'value',
  },
  {
    id: 'steps',
    label: 'Steps',
    unit: 'steps',
    tables: ['steps_daily', 'steps', 'daily_steps', 'activity_steps'],
    fields: [
      { field: 'timestamp', candidates: ['date', 'measured_at', 'timestamp', 'created_at', 'day'], required: true },
      { field: 'value', candidates: ['steps', 'step_count', 'value', 'total_steps'], required: true },
      SOURCE_FIELD,
    ],
    timestampField: 'timestamp',
    valueField: 'value',
  },
  {
    id: 'sleep',
    label: 'Sleep',
    unit: 'min',
    tables: ['sleep_sessions', 'sleep', 'sleep_data', 'sleep_records'],
    fields: [
      {
        field: 'timestamp',
        candidates: ['start', 'start_time', 'sleep_start', 'bedtime', 'started_at', 'date', 'night', 'created_at'],
        required: true,
      },
      { field: 'end', candidates: ['end', 'end_time', 'sleep_end', 'wake_time', 'ended_at'], required: false },
      {
        field: 'value',
        candidates: ['duration', 'duration_minutes', 'total_minutes', 'sleep_duration'],
        required: false,
      },
      { field: 'stages', candidates: ['stages', 'stages_summary', 'sleep_stages'], required: false },
    ],
    timestampField: 'timestamp',
    valueField: 'value',
  },
  {
    id: 'heart',
    label: 'Heart rate',
    unit: 'bpm',
    tables: ['heart_rate_daily', 'heart_rate_samples', 'heart_rate', 'heartrate', 'hr_data'],
    fields: [
      {
        field: 'timestamp',
        candidates: ['date', 'measured_at', 'timestamp', 'created_at', 'time', 'day'],
        required: true,
      },
      {
        field: 'value',
        candidates: ['bpm', 'heart_rate', 'avg_bpm', 'value', 'resting_hr', 'avg_hr'],
        required: true,
      },
      { field: 'min', candidates: ['min_bpm', 'min_hr', 'resting_hr'], required: false },
      { field: 'max', candidates: ['max_bpm', 'max_hr'], required: false },
    ],
    timestampField: 'timestamp',
    valueField: 'value',
  },
];
