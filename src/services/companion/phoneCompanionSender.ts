import type { WatchAssignment, WatchGrade, WatchScheduleEntry } from '../../domain/companion';
import { describeError } from '../../utils/devLog';
import { encodeCompanionContext } from './companionContext';
import type { CompanionSession } from './companionTransport';

export const MAX_COMPANION_ASSIGNMENTS = 20;

/**
 * Phone-side assignment as loaded from the backend. Extra fields are ignored.
 */
export type PhoneAssignment = {
  id: string;
  title: string;
  courseName: string;
  dueDate: Date | string;
  points: number;
  isSubmitted: boolean;
  grade?: number | null;
};

export type PhoneGradeEntry = WatchGrade;

export type PhoneScheduleEntry = {
  id: string;
  courseName: string;
  startTime: Date | string;
  endTime: Date | string;
  roomNumber?: string | null;
};

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

/**
 * Open work only, soonest first, capped so the payload stays small.
 */
export function projectAssignments(assignments: readonly PhoneAssignment[]): WatchAssignment[] {
  return assignments
    .filter((a) => !a.isSubmitted)
    .map((a) => ({
      id: a.id,
      title: a.title,
      courseName: a.courseName,
      dueDate: toDate(a.dueDate),
      points: a.points,
      isSubmitted: a.isSubmitted,
      grade: a.grade ?? null,
    }))
    .sort((a, b) => a.dueDate.getTime() - b.dueDate.getTime())
    .slice(0, MAX_COMPANION_ASSIGNMENTS);
}

export function projectSchedule(entries: readonly PhoneScheduleEntry[]): WatchScheduleEntry[] {
  return entries.map((e) => ({
    id: e.id,
    courseName: e.courseName,
    startTime: toDate(e.startTime),
    endTime: toDate(e.endTime),
    roomNumber: (e.roomNumber ?? '').trim(),
  }));
}

export function projectGrades(grades: readonly PhoneGradeEntry[]): WatchGrade[] {
  return grades.map((g) => ({
    id: g.id,
    courseName: g.courseName,
    letterGrade: g.letterGrade,
    numericGrade: g.numericGrade,
    courseColor: g.courseColor,
    courseIcon: g.courseIcon,
  }));
}

/**
 * Pushes the phone's current assignments, schedule and grades to the companion.
 * Call after the app finishes loading its data.
 */
export class PhoneCompanionSender {
  lastError: string | null = null;
  lastSendAtMs: number | null = null;

  constructor(
    private readonly session: CompanionSession,
    private readonly now: () => number = Date.now,
  ) {}

  send(params: {
    assignments: readonly PhoneAssignment[];
    schedule: readonly PhoneScheduleEntry[];
    grades: readonly PhoneGradeEntry[];
  }): boolean {
    if (!this.session.isSupported()) return false;
    if (this.session.activationState !== 'activated') {
      this.lastError = 'Companion session not activated';
      return false;
    }
    if (!this.session.isPaired) {
      this.lastError = 'No companion device paired';
      return false;
    }
    if (!this.session.isCompanionAppInstalled) {
      this.lastError = 'Companion app not installed';
      return false;
    }

    const context = encodeCompanionContext({
      assignments: projectAssignments(params.assignments),
      schedule: projectSchedule(params.schedule),
      grades: projectGrades(params.grades),
    });

    try {
      this.session.updateApplicationContext(context);
    } catch (e) {
      this.lastError = `Failed to send: ${describeError(e)}`;
      console.warn('Failed to send companion context', e);
      return false;
    }
    this.lastSendAtMs = this.now();
    this.lastError = null;
    return true;
  }
}
