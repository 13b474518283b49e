export type TaskStatus = 'pending' | 'complete' | 'canceled';

export type Priority = 'lowest' | 'low' | 'normal' | 'medium' | 'high' | 'highest';

/** Calendar date, `YYYY-MM-DD`. No time-of-day, no zone. */
export type CalendarDate = string;

export type DateField = 'due' | 'scheduled' | 'start' | 'created' | 'done' | 'canceled';

export const DATE_FIELDS: readonly DateField[] = ['due', 'scheduled', 'start', 'created', 'done', 'canceled'];

/** Tag implied by `highest` priority. */
export const NEXT_TAG = 'next';

export interface TaskRecord {
  /** Anchors the line to one external record. Absent until first synced. */
  uuid?: string;
  status: TaskStatus;
  /** Trimmed; `#tags` stay embedded. */
  description: string;
  tags: string[];
  due?: CalendarDate;
  scheduled?: CalendarDate;
  start?: CalendarDate;
  created?: CalendarDate;
  done?: CalendarDate;
  canceled?: CalendarDate;
  priority: Priority;
  project?: string;
}

export type TaskRecordInit = Partial<TaskRecord> & Pick<TaskRecord, 'description'>;

/**
 * Build a record from named fields. Unspecified fields default to:
 * status `pending`, priority `normal`, no tags, no dates, no project, no uuid.
 */
export function createTaskRecord(init: TaskRecordInit): TaskRecord {
  const record: TaskRecord = {
    status: init.status ?? 'pending',
    description: init.description,
    tags: [...(init.tags ?? [])],
    priority: init.priority ?? 'normal',
  };
  if (init.uuid !== undefined) record.uuid = init.uuid;
  for (const field of DATE_FIELDS) {
    const value = init[field];
    if (value !== undefined) record[field] = value;
  }
  if (init.project !== undefined) record.project = init.project;
  return record;
}
