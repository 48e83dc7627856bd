import {
  DEEP_LINK_DESTINATION_KINDS,
  DEEP_LINK_HOST_BY_KIND,
  DEFAULT_DEEP_LINK_SCHEME,
  entityDestination,
  isEntityDestinationKind,
  normalizeUuid,
  type DeepLinkDestination,
  type DeepLinkDestinationKind,
  type EntityDestinationKind,
} from '../domain/deepLinks';

/**
 * Activity type the OS uses when the user taps one of our items in system search.
 */
export const SEARCHABLE_ITEM_ACTION_TYPE = 'com.apple.corespotlightitem';

/**
 * `userInfo` key carrying the tapped item's unique identifier.
 */
export const SEARCHABLE_ITEM_IDENTIFIER_KEY = 'kCSSearchableItemActivityIdentifier';

export type SearchActivity = {
  activityType: string;
  userInfo?: Record<string, unknown> | null;
};

const KIND_BY_HOST = new Map<string, DeepLinkDestinationKind>(
  DEEP_LINK_DESTINATION_KINDS.map((kind): [string, DeepLinkDestinationKind] => [DEEP_LINK_HOST_BY_KIND[kind], kind]),
);

function schemeMatches(parsed: URL, scheme: string): boolean {
  return parsed.protocol === `${scheme.toLowerCase()}:`;
}

function firstPathSegment(pathname: string): string | null {
  const segment = pathname.split('/').find((part) => part.length > 0);
  if (!segment) return null;
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

/**
 * Parse an `app://<family>[/<uuid>]` URL into a destination.
 *
 * Supported formats:
 * - app://assignments, app://grades, app://schedule
 * - app://tools, app://wellness, app://shareplay, app://recommendations
 * - app://course/<uuid>, app://assignment/<uuid>, app://quiz/<uuid>
 *
 * Returns null for other schemes, unknown hosts, and entity links whose first
 * path segment is not a UUID. Trailing segments on list links are ignored.
 */
export function parseDeepLinkUrl(
  url: string | URL,
  scheme: string = DEFAULT_DEEP_LINK_SCHEME,
): DeepLinkDestination | null {
  let parsed: URL;
  try {
    parsed = typeof url === 'string' ? new URL(url) : url;
  } catch {
    return null;
  }
  if (!schemeMatches(parsed, scheme)) return null;

  const kind = KIND_BY_HOST.get(parsed.hostname);
  if (!kind) return null;

  if (isEntityDestinationKind(kind)) {
    const id = normalizeUuid(firstPathSegment(parsed.pathname));
    return id ? entityDestination(kind, id) : null;
  }

  return { kind };
}

/**
 * Parse a search-index identifier of the form `<kind>:<uuid>`.
 */
export function parseSearchIdentifier(identifier: string): DeepLinkDestination | null {
  const separator = identifier.indexOf(':');
  if (separator < 0) return null;
  const kind = identifier.slice(0, separator);
  const id = normalizeUuid(identifier.slice(separator + 1));
  if (!id || !isEntityDestinationKind(kind)) return null;
  return entityDestination(kind, id);
}

export function parseSearchActivity(activity: SearchActivity): DeepLinkDestination | null {
  if (activity.activityType !== SEARCHABLE_ITEM_ACTION_TYPE) return null;
  const identifier = activity.userInfo?.[SEARCHABLE_ITEM_IDENTIFIER_KEY];
  if (typeof identifier !== 'string') return null;
  return parseSearchIdentifier(identifier);
}

export function buildDeepLinkUrl(
  destination: DeepLinkDestination,
  scheme: string = DEFAULT_DEEP_LINK_SCHEME,
): string {
  const host = DEEP_LINK_HOST_BY_KIND[destination.kind];
  if ('id' in destination) {
    return `${scheme}://${host}/${encodeURIComponent(destination.id)}`;
  }
  return `${scheme}://${host}`;
}

export function buildSearchIdentifier(kind: EntityDestinationKind, id: string): string {
  return `${kind}:${id}`;
}

export function buildSearchActivity(identifier: string): SearchActivity {
  return {
    activityType: SEARCHABLE_ITEM_ACTION_TYPE,
    userInfo: { [SEARCHABLE_ITEM_IDENTIFIER_KEY]: identifier },
  };
}
