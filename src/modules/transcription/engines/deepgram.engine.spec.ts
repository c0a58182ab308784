import { extractDeepgramSegments } from './deepgram.engine';
import { DeepgramResult, DeepgramWord } from '../../../providers/deepgram/deepgram.service';

const word = (
  text: string,
  start: number,
  end: number,
  speaker?: number,
  punctuated?: string,
): DeepgramWord => ({
  word: text,
  start,
  end,
  confidence: 0.99,
  speaker,
  punctuated_word: punctuated,
});

const result = (words: DeepgramWord[], utterances: DeepgramResult['utterances'] = []): DeepgramResult => ({
  duration: 4,
  channels: [{ alternatives: [{ transcript: '', confidence: 0.99, words }] }],
  utterances,
});

describe('extractDeepgramSegments', () => {
  it('prefers utterances when present', () => {
    const segments = extractDeepgramSegments(
      result([], [
        { start: 0, end: 1.5, confidence: 0.9, channel: 0, transcript: 'Hello', speaker: 0, words: [] },
        { start: 1.5, end: 3, confidence: 0.9, channel: 0, transcript: 'Hi back', speaker: 1, words: [] },
      ]),
    );

    expect(segments).toEqual([
      { start: 0, end: 1.5, text: 'Hello', speaker: 'Speaker 0' },
      { start: 1.5, end: 3, text: 'Hi back', speaker: 'Speaker 1' },
    ]);
  });

  it('groups words by speaker change and long pauses', () => {
    const segments = extractDeepgramSegments(
      result([
        word('hi', 0, 0.4, 0, 'Hi'),
        word('there', 0.5, 0.9, 0, 'there.'),
        word('yes', 1.0, 1.3, 1),
        word('ok', 3.0, 3.5, 1),
      ]),
    );

    expect(segments).toEqual([
      { start: 0, end: 0.9, text: 'Hi there.', speaker: 'Speaker 0' },
      { start: 1.0, end: 1.3, text: 'yes', speaker: 'Speaker 1' },
      { start: 3.0, end: 3.5, text: 'ok', speaker: 'Speaker 1' },
    ]);
  });

  it('leaves the speaker empty without diarization', () => {
    expect(extractDeepgramSegments(result([word('solo', 0, 1)]))).toEqual([
      { start: 0, end: 1, text: 'solo', speaker: null },
    ]);
  });

  it('returns nothing for an empty result', () => {
    expect(extractDeepgramSegments({ duration: 0, channels: [], utterances: [] })).toEqual([]);
  });
});
