import { z } from 'zod';

export const DEFAULT_DEEP_LINK_SCHEME = 'app';

/**
 * Typed navigation target resolved from a URL, a search result, or a shortcut.
 * Destinations are values: built, applied once, discarded.
 */
export type DeepLinkDestination =
  | { kind: 'assignments' }
  | { kind: 'grades' }
  | { kind: 'schedule' }
  | { kind: 'tools' }
  | { kind: 'wellness' }
  | { kind: 'sharePlay' }
  | { kind: 'recommendations' }
  | { kind: 'course'; id: string }
  | { kind: 'assignment'; id: string }
  | { kind: 'quiz'; id: string };

export type DeepLinkDestinationKind = DeepLinkDestination['kind'];

export type EntityDestinationKind = Extract<DeepLinkDestination, { id: string }>['kind'];

export type ListDestinationKind = Exclude<DeepLinkDestinationKind, EntityDestinationKind>;

export const DEEP_LINK_DESTINATION_KINDS: readonly DeepLinkDestinationKind[] = [
  'assignments',
  'grades',
  'schedule',
  'tools',
  'wellness',
  'sharePlay',
  'recommendations',
  'course',
  'assignment',
  'quiz',
];

export const ENTITY_DESTINATION_KINDS: readonly EntityDestinationKind[] = ['course', 'assignment', 'quiz'];

/**
 * URL host for each destination family. `sharePlay` is the only kind whose
 * host differs from its name.
 */
export const DEEP_LINK_HOST_BY_KIND: Record<DeepLinkDestinationKind, string> = {
  assignments: 'assignments',
  grades: 'grades',
  schedule: 'schedule',
  tools: 'tools',
  wellness: 'wellness',
  sharePlay: 'shareplay',
  recommendations: 'recommendations',
  course: 'course',
  assignment: 'assignment',
  quiz: 'quiz',
};

export function isEntityDestinationKind(kind: string): kind is EntityDestinationKind {
  return ENTITY_DESTINATION_KINDS.some((entityKind) => entityKind === kind);
}

const uuidSchema = z.string().uuid();

/**
 * Lower-cased UUID when `raw` is a canonical 8-4-4-4-12 hex string (any
 * version), otherwise null. Surrounding whitespace is not accepted.
 */
export function normalizeUuid(raw: string | null | undefined): string | null {
  if (!raw || !uuidSchema.safeParse(raw).success) return null;
  return raw.toLowerCase();
}

export function entityDestination(kind: EntityDestinationKind, id: string): DeepLinkDestination {
  switch (kind) {
    case 'course':
      return { kind: 'course', id };
    case 'assignment':
      return { kind: 'assignment', id };
    case 'quiz':
      return { kind: 'quiz', id };
  }
}
