import { DEEP_LINK_DESTINATION_KINDS, entityDestination, isEntityDestinationKind } from '../domain/deepLinks';
import type { DeepLinkDestination } from '../domain/deepLinks';
import {
  SEARCHABLE_ITEM_ACTION_TYPE,
  SEARCHABLE_ITEM_IDENTIFIER_KEY,
  buildDeepLinkUrl,
  buildSearchActivity,
  buildSearchIdentifier,
  parseDeepLinkUrl,
  parseSearchActivity,
  parseSearchIdentifier,
} from './deepLinkParser';

const COURSE_ID = '3f2b8c1e-4d5a-4b6c-9d7e-1a2b3c4d5e6f';
const ASSIGNMENT_ID = 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d';
const QUIZ_ID = '0c9d8e7f-6a5b-4c3d-a2e1-f0a9b8c7d6e5';
const TIME_ORDERED_ID = '01890a5d-ac96-774b-bcce-b302099a8057';
const MAX_ID = 'ffffffff-ffff-ffff-ffff-ffffffffffff';

describe('parseDeepLinkUrl', () => {
  it('parses entity links carrying a UUID', () => {
    expect(parseDeepLinkUrl(`app://course/${COURSE_ID}`)).toEqual({ kind: 'course', id: COURSE_ID });
    expect(parseDeepLinkUrl(`app://assignment/${ASSIGNMENT_ID}`)).toEqual({ kind: 'assignment', id: ASSIGNMENT_ID });
    expect(parseDeepLinkUrl(`app://quiz/${QUIZ_ID}`)).toEqual({ kind: 'quiz', id: QUIZ_ID });
  });

  it('normalizes upper-case identifiers', () => {
    expect(parseDeepLinkUrl(`app://course/${COURSE_ID.toUpperCase()}`)).toEqual({ kind: 'course', id: COURSE_ID });
  });

  it('accepts identifiers of any UUID version', () => {
    expect(parseDeepLinkUrl(`app://course/${TIME_ORDERED_ID}`)).toEqual({ kind: 'course', id: TIME_ORDERED_ID });
    expect(parseDeepLinkUrl(`app://assignment/${MAX_ID}`)).toEqual({ kind: 'assignment', id: MAX_ID });
  });

  it('rejects identifiers padded with whitespace', () => {
    expect(parseDeepLinkUrl(`app://course/%20${COURSE_ID}`)).toBeNull();
    expect(parseDeepLinkUrl(`app://course/${COURSE_ID}%20`)).toBeNull();
  });

  it('rejects entity links without a valid UUID instead of falling back', () => {
    expect(parseDeepLinkUrl('app://course/not-a-uuid')).toBeNull();
    expect(parseDeepLinkUrl('app://assignment')).toBeNull();
    expect(parseDeepLinkUrl('app://quiz/')).toBeNull();
  });

  it('maps every list family and ignores trailing segments', () => {
    expect(parseDeepLinkUrl('app://assignments')).toEqual({ kind: 'assignments' });
    expect(parseDeepLinkUrl('app://grades/extra/segments?tab=2')).toEqual({ kind: 'grades' });
    expect(parseDeepLinkUrl('app://schedule')).toEqual({ kind: 'schedule' });
    expect(parseDeepLinkUrl('app://tools')).toEqual({ kind: 'tools' });
    expect(parseDeepLinkUrl('app://wellness')).toEqual({ kind: 'wellness' });
    expect(parseDeepLinkUrl('app://shareplay')).toEqual({ kind: 'sharePlay' });
    expect(parseDeepLinkUrl('app://recommendations')).toEqual({ kind: 'recommendations' });
  });

  it('returns null for other schemes, unknown hosts and junk', () => {
    expect(parseDeepLinkUrl('https://assignments')).toBeNull();
    expect(parseDeepLinkUrl('app://lessons')).toBeNull();
    expect(parseDeepLinkUrl('app://constructor')).toBeNull();
    expect(parseDeepLinkUrl('not a url')).toBeNull();
    expect(parseDeepLinkUrl('')).toBeNull();
  });

  it('honors a configured scheme', () => {
    expect(parseDeepLinkUrl('schoolday://grades', 'schoolday')).toEqual({ kind: 'grades' });
    expect(parseDeepLinkUrl('app://grades', 'schoolday')).toBeNull();
  });

  it('accepts URL objects', () => {
    expect(parseDeepLinkUrl(new URL(`app://quiz/${QUIZ_ID}`))).toEqual({ kind: 'quiz', id: QUIZ_ID });
  });
});

describe('parseSearchIdentifier', () => {
  it('splits at the first colon into kind and UUID', () => {
    expect(parseSearchIdentifier(`course:${COURSE_ID}`)).toEqual({ kind: 'course', id: COURSE_ID });
    expect(parseSearchIdentifier(`assignment:${ASSIGNMENT_ID}`)).toEqual({ kind: 'assignment', id: ASSIGNMENT_ID });
    expect(parseSearchIdentifier(`quiz:${QUIZ_ID}`)).toEqual({ kind: 'quiz', id: QUIZ_ID });
  });

  it('rejects unknown kinds, missing parts and bad identifiers', () => {
    expect(parseSearchIdentifier(`lesson:${COURSE_ID}`)).toBeNull();
    expect(parseSearchIdentifier('course')).toBeNull();
    expect(parseSearchIdentifier('course:12345')).toBeNull();
    expect(parseSearchIdentifier(`assignment:${ASSIGNMENT_ID}:extra`)).toBeNull();
    expect(parseSearchIdentifier(`grades:${COURSE_ID}`)).toBeNull();
  });

  it('rejects whitespace around the identifier', () => {
    expect(parseSearchIdentifier(`course: ${COURSE_ID}`)).toBeNull();
    expect(parseSearchIdentifier(`course:${COURSE_ID} `)).toBeNull();
  });

  it('accepts identifiers of any UUID version', () => {
    expect(parseSearchIdentifier(`quiz:${MAX_ID}`)).toEqual({ kind: 'quiz', id: MAX_ID });
    expect(parseSearchIdentifier(`course:${TIME_ORDERED_ID}`)).toEqual({ kind: 'course', id: TIME_ORDERED_ID });
  });
});

describe('parseSearchActivity', () => {
  it('reads the identifier from a search-item activity', () => {
    const activity = {
      activityType: SEARCHABLE_ITEM_ACTION_TYPE,
      userInfo: { [SEARCHABLE_ITEM_IDENTIFIER_KEY]: `quiz:${QUIZ_ID}` },
    };
    expect(parseSearchActivity(activity)).toEqual({ kind: 'quiz', id: QUIZ_ID });
  });

  it('ignores other activity types and malformed user info', () => {
    expect(
      parseSearchActivity({
        activityType: 'com.example.browsing',
        userInfo: { [SEARCHABLE_ITEM_IDENTIFIER_KEY]: `quiz:${QUIZ_ID}` },
      }),
    ).toBeNull();
    expect(parseSearchActivity({ activityType: SEARCHABLE_ITEM_ACTION_TYPE })).toBeNull();
    expect(
      parseSearchActivity({ activityType: SEARCHABLE_ITEM_ACTION_TYPE, userInfo: { [SEARCHABLE_ITEM_IDENTIFIER_KEY]: 7 } }),
    ).toBeNull();
  });
});

describe('builders', () => {
  it('builds the canonical URL for each destination', () => {
    expect(buildDeepLinkUrl({ kind: 'sharePlay' })).toBe('app://shareplay');
    expect(buildDeepLinkUrl({ kind: 'course', id: COURSE_ID })).toBe(`app://course/${COURSE_ID}`);
    expect(buildDeepLinkUrl({ kind: 'grades' }, 'schoolday')).toBe('schoolday://grades');
  });

  it('parses back every destination kind it builds', () => {
    DEEP_LINK_DESTINATION_KINDS.forEach((kind) => {
      const destination: DeepLinkDestination = isEntityDestinationKind(kind)
        ? entityDestination(kind, COURSE_ID)
        : { kind };
      expect(parseDeepLinkUrl(buildDeepLinkUrl(destination))).toEqual(destination);
    });
  });

  it('builds search activities the parser accepts', () => {
    const identifier = buildSearchIdentifier('assignment', ASSIGNMENT_ID);
    expect(identifier).toBe(`assignment:${ASSIGNMENT_ID}`);
    expect(parseSearchActivity(buildSearchActivity(identifier))).toEqual({ kind: 'assignment', id: ASSIGNMENT_ID });
  });
});
