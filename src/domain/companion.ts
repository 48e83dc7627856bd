import { z } from 'zod';

/**
 * Read-only projections shipped from the phone to the companion device.
 * They are copies: each device owns its own instances and nothing is shared.
 */

const dateField = z
  .union([z.string().datetime({ offset: true }), z.number().finite()])
  .transform((value) => new Date(value))
  .pipe(z.date());

export const watchAssignmentSchema = z.object({
  id: z.string().uuid(),
  title: z.string(),
  courseName: z.string(),
  dueDate: dateField,
  points: z.number().int(),
  isSubmitted: z.boolean(),
  // Older phone builds omit the key entirely when there is no grade yet.
  grade: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
});

export const watchScheduleEntrySchema = z.object({
  id: z.string().uuid(),
  courseName: z.string(),
  startTime: dateField,
  endTime: dateField,
  roomNumber: z.string(),
});

export const watchGradeSchema = z.object({
  id: z.string().uuid(),
  courseName: z.string(),
  letterGrade: z.string(),
  numericGrade: z.number(),
  courseColor: z.string(),
  courseIcon: z.string(),
});

export type WatchAssignment = z.output<typeof watchAssignmentSchema>;
export type WatchScheduleEntry = z.output<typeof watchScheduleEntrySchema>;
export type WatchGrade = z.output<typeof watchGradeSchema>;

export type CompanionCollections = {
  assignments: WatchAssignment[];
  schedule: WatchScheduleEntry[];
  grades: WatchGrade[];
};

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function isSameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate()
  );
}

export function isDueToday(assignment: WatchAssignment, now: Date = new Date()): boolean {
  return isSameLocalDay(assignment.dueDate, now);
}

export function isDueTomorrow(assignment: WatchAssignment, now: Date = new Date()): boolean {
  const tomorrow = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  return isSameLocalDay(assignment.dueDate, tomorrow);
}

export function isOverdue(assignment: WatchAssignment, now: Date = new Date()): boolean {
  return !assignment.isSubmitted && assignment.dueDate.getTime() < now.getTime();
}

/**
 * Whole calendar days from today to the due day: 0 for today, negative once past.
 */
export function daysUntilDue(assignment: WatchAssignment, now: Date = new Date()): number {
  const diffMs = startOfLocalDay(assignment.dueDate).getTime() - startOfLocalDay(now).getTime();
  // Rounded so a DST shift inside the window doesn't lose a day.
  return Math.round(diffMs / DAY_MS);
}

export function isCurrentlyActive(entry: WatchScheduleEntry, now: Date = new Date()): boolean {
  const t = now.getTime();
  return t >= entry.startTime.getTime() && t <= entry.endTime.getTime();
}

export function isUpcoming(entry: WatchScheduleEntry, now: Date = new Date()): boolean {
  return now.getTime() < entry.startTime.getTime();
}

export function secondsUntilStart(entry: WatchScheduleEntry, now: Date = new Date()): number {
  return Math.max(0, (entry.startTime.getTime() - now.getTime()) / 1000);
}
