import { z } from 'zod';
import {
  watchAssignmentSchema,
  watchGradeSchema,
  watchScheduleEntrySchema,
  type CompanionCollections,
} from '../../domain/companion';

/**
 * Transport payload: each key maps to one independently serialized collection.
 * Values are JSON text (dates as ISO-8601); raw UTF-8 bytes are accepted too.
 */
export type CompanionContext = Record<string, unknown>;

export type CompanionCollectionKey = keyof CompanionCollections;

export const COMPANION_COLLECTION_KEYS: readonly CompanionCollectionKey[] = ['assignments', 'schedule', 'grades'];

const assignmentsSchema = z.array(watchAssignmentSchema);
const scheduleSchema = z.array(watchScheduleEntrySchema);
const gradesSchema = z.array(watchGradeSchema);

export type DecodedCompanionContext = Partial<CompanionCollections> & {
  /** Keys that were present but could not be decoded. */
  failedKeys: CompanionCollectionKey[];
};

export function encodeCollection(records: readonly unknown[]): string {
  return JSON.stringify(records);
}

export function encodeCompanionContext(collections: Partial<CompanionCollections>): CompanionContext {
  const context: CompanionContext = {};
  if (collections.assignments) context.assignments = encodeCollection(collections.assignments);
  if (collections.schedule) context.schedule = encodeCollection(collections.schedule);
  if (collections.grades) context.grades = encodeCollection(collections.grades);
  return context;
}

function readText(raw: unknown): string | null {
  if (typeof raw === 'string') return raw;
  if (raw instanceof Uint8Array) return new TextDecoder().decode(raw);
  return null;
}

/**
 * Decode one serialized collection. Null when the value is missing, not JSON,
 * or any record fails validation; one bad record rejects the whole collection.
 */
export function decodeCollection<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> | null {
  const text = readText(raw);
  if (text === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const result = schema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function decodeCompanionContext(context: CompanionContext): DecodedCompanionContext {
  const decoded: DecodedCompanionContext = { failedKeys: [] };

  if (context.assignments !== undefined) {
    const assignments = decodeCollection(assignmentsSchema, context.assignments);
    if (assignments) decoded.assignments = assignments;
    else decoded.failedKeys.push('assignments');
  }

  if (context.schedule !== undefined) {
    const schedule = decodeCollection(scheduleSchema, context.schedule);
    if (schedule) decoded.schedule = schedule;
    else decoded.failedKeys.push('schedule');
  }

  if (context.grades !== undefined) {
    const grades = decodeCollection(gradesSchema, context.grades);
    if (grades) decoded.grades = grades;
    else decoded.failedKeys.push('grades');
  }

  return decoded;
}

export const companionCollectionSchemas = {
  assignments: assignmentsSchema,
  schedule: scheduleSchema,
  grades: gradesSchema,
};
