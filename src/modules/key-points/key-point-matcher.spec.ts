import {
  findAnchorSegment,
  longestCommonSubstring,
  matchToSegments,
  normalizeText,
} from './key-point-matcher';
import { TimedSegment } from '../transcription/transcription-engine';

const segments: TimedSegment[] = [
  { start: 0, end: 10, text: 'Welcome to the show, today we talk about sleep.', speaker: null },
  { start: 10, end: 25, text: 'Deep sleep helps the brain clear waste products every night.', speaker: null },
  { start: 25, end: 40, text: 'Coffee after noon can delay your sleep by hours.', speaker: null },
  { start: 40, end: 60, text: 'Thanks for listening.', speaker: null },
];

describe('normalizeText', () => {
  it('lowercases and collapses punctuation and whitespace', () => {
    expect(normalizeText('Hello, World!  你好')).toBe('hello world 你好');
  });
});

describe('longestCommonSubstring', () => {
  it('returns the length of the longest shared run', () => {
    expect(longestCommonSubstring('abcdef', 'zcdez')).toBe(3);
    expect(longestCommonSubstring('', 'abc')).toBe(0);
  });
});

describe('findAnchorSegment', () => {
  it('picks the segment containing the quote', () => {
    expect(findAnchorSegment('the brain clear waste', { start: 0, end: 5 }, segments, 12)).toBe(1);
  });

  it('prefers the earliest segment on a tie', () => {
    expect(findAnchorSegment('Sleep!', { start: 30, end: 35 }, segments, 12)).toBe(0);
  });

  it('falls back to the largest time overlap when the quote does not match', () => {
    expect(
      findAnchorSegment('completely unrelated words here', { start: 41, end: 50 }, segments, 12),
    ).toBe(3);
  });
});

describe('matchToSegments', () => {
  it('snaps to the quoted segment when the model range is elsewhere', () => {
    expect(matchToSegments('the brain clear waste', { start: 0, end: 5 }, segments, 12)).toEqual({
      start: 10,
      end: 25,
    });
  });

  it('covers the union of the model range and the quoted segment when they touch', () => {
    expect(matchToSegments('coffee after noon', { start: 20, end: 30 }, segments, 12)).toEqual({
      start: 10,
      end: 40,
    });
  });

  it('uses the model range on segment boundaries without a quote match', () => {
    expect(
      matchToSegments('completely unrelated words here', { start: 41, end: 50 }, segments, 12),
    ).toEqual({ start: 40, end: 60 });
  });
});
