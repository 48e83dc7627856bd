import type { EntityDestinationKind } from '../../domain/deepLinks';
import { buildSearchIdentifier } from '../../navigation/deepLinkParser';

export const SEARCH_DOMAIN_BY_KIND: Record<EntityDestinationKind, string> = {
  course: 'schoolday.course',
  assignment: 'schoolday.assignment',
  quiz: 'schoolday.quiz',
};

const MAX_INDEXED_ITEMS = 200;

export type SearchableItem = {
  uniqueIdentifier: string;
  domainIdentifier: string;
  title: string;
  contentDescription?: string;
};

/**
 * Host-provided system search index (a native bridge on device).
 */
export interface SearchIndexClient {
  indexItemsJson(json: string): Promise<void>;
  deleteItems(identifiers: string[]): Promise<void>;
  deleteAll(): Promise<void>;
}

type IndexableContent = {
  courses?: Array<{ id: string; title: string; teacherName?: string | null }>;
  assignments?: Array<{ id: string; title: string; courseName?: string | null }>;
  quizzes?: Array<{ id: string; title: string; courseName?: string | null }>;
};

function item(kind: EntityDestinationKind, id: string, title: string, description?: string | null): SearchableItem {
  const contentDescription = description?.trim();
  return {
    uniqueIdentifier: buildSearchIdentifier(kind, id),
    domainIdentifier: SEARCH_DOMAIN_BY_KIND[kind],
    title,
    ...(contentDescription ? { contentDescription } : {}),
  };
}

/**
 * Index ids + titles only, courses first, capped.
 */
export function buildSearchableItems(content: IndexableContent): SearchableItem[] {
  return [
    ...(content.courses ?? []).map((c) => item('course', c.id, c.title, c.teacherName)),
    ...(content.assignments ?? []).map((a) => item('assignment', a.id, a.title, a.courseName)),
    ...(content.quizzes ?? []).map((q) => item('quiz', q.id, q.title, q.courseName)),
  ].slice(0, MAX_INDEXED_ITEMS);
}

export async function indexContentForSearch(
  client: SearchIndexClient | null | undefined,
  content: IndexableContent,
): Promise<boolean> {
  if (!client) return false;
  try {
    await client.indexItemsJson(JSON.stringify(buildSearchableItems(content)));
    return true;
  } catch (e) {
    console.warn('Failed to index search content', e);
    return false;
  }
}

export async function deindexSearchItem(
  client: SearchIndexClient | null | undefined,
  kind: EntityDestinationKind,
  id: string,
): Promise<boolean> {
  if (!client) return false;
  try {
    await client.deleteItems([buildSearchIdentifier(kind, id)]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove everything on sign-out so the next user doesn't see stale results.
 */
export async function clearSearchIndex(client: SearchIndexClient | null | undefined): Promise<boolean> {
  if (!client) return false;
  try {
    await client.deleteAll();
    return true;
  } catch {
    return false;
  }
}
