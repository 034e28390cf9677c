import { describe, it, expect } from '@jest/globals';
import {
  bucketSentences,
  mergeShortestParagraphs,
  segmentStory,
  splitByParagraphs,
  splitBySentences,
} from '@/services/segmentation';
import { eventsOfType, recordingObserver } from './helpers/fakes';

describe('splitByParagraphs', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    const text = '  First paragraph.\n\n\n\nSecond one.\n   \nThird.\n\n';
    expect(splitByParagraphs(text)).toEqual(['First paragraph.', 'Second one.', 'Third.']);
  });
});

describe('splitBySentences', () => {
  it('keeps terminators and joins lines', () => {
    expect(splitBySentences('Hello there. How are\nyou? Great!')).toEqual([
      'Hello there.',
      'How are you?',
      'Great!',
    ]);
  });

  it('returns the whole text when there is no terminator', () => {
    expect(splitBySentences('once upon a time')).toEqual(['once upon a time']);
  });
});

describe('bucketSentences', () => {
  it('never divides by zero when there are fewer sentences than pages', () => {
    expect(bucketSentences(['One.', 'Two.'], 4)).toEqual(['One.', 'Two.']);
  });

  it('groups floor(n / pages) sentences per page and keeps the first buckets', () => {
    const sentences = ['A.', 'B.', 'C.', 'D.', 'E.', 'F.', 'G.', 'H.', 'I.'];
    expect(bucketSentences(sentences, 4)).toEqual(['A. B.', 'C. D.', 'E. F.', 'G. H.']);
  });
});

describe('mergeShortestParagraphs', () => {
  it('merges the shortest paragraph into its predecessor, earliest on ties', () => {
    const paragraphs = ['aaaa', 'bb', 'cccccc', 'd', 'eeeee', 'ff', 'ggg'];
    expect(mergeShortestParagraphs(paragraphs, 4)).toEqual(['aaaa\nbb', 'cccccc\nd', 'eeeee\nff', 'ggg']);
  });

  it('pulls the second paragraph into the first when the first is shortest', () => {
    const paragraphs = ['a', 'bbbb', 'cccc', 'dddd', 'eeee', 'ffff', 'gggg'];
    expect(mergeShortestParagraphs(paragraphs, 4)).toEqual([
      'a\nbbbb\ncccc\ndddd',
      'eeee',
      'ffff',
      'gggg',
    ]);
  });

  it('does not modify its input', () => {
    const paragraphs = ['a', 'bb', 'ccc'];
    mergeShortestParagraphs(paragraphs, 1);
    expect(paragraphs).toEqual(['a', 'bb', 'ccc']);
  });
});

describe('segmentStory', () => {
  it('returns balanced paragraphs unchanged', () => {
    const paragraphs = ['One fine day.', 'Two birds sang.', 'Three cats slept.', 'Four dogs ran.'];
    const { observer, events } = recordingObserver();

    expect(segmentStory(paragraphs.join('\n\n'), 4, observer)).toEqual(paragraphs);
    expect(events).toEqual([{ type: 'segmentation.completed', pageCount: 4, targetPages: 4 }]);
  });

  it('splits a two-paragraph story into four sentence pages', () => {
    const story =
      'Luna woke up early. She looked outside.\n\nMax was waiting! Together they walked to the lake? The end.';
    const { observer, events } = recordingObserver();

    expect(segmentStory(story, 4, observer)).toEqual([
      'Luna woke up early.',
      'She looked outside.',
      'Max was waiting!',
      'Together they walked to the lake?',
    ]);
    expect(eventsOfType(events, 'segmentation.sentences')).toEqual([
      { type: 'segmentation.sentences', paragraphCount: 2, sentenceCount: 5, targetPages: 4 },
    ]);
  });

  it('forces the sentence branch for a single giant paragraph', () => {
    const story = 'S1. S2. S3. S4. S5. S6. S7. S8.';
    expect(segmentStory(story, 4)).toEqual(['S1. S2.', 'S3. S4.', 'S5. S6.', 'S7. S8.']);
  });

  it('handles prose without any sentence punctuation', () => {
    expect(segmentStory('once upon a time there was a fox', 4)).toEqual(['once upon a time there was a fox']);
  });

  it('merges when there are far too many paragraphs', () => {
    const story = ['aaaa', 'bb', 'cccccc', 'd', 'eeeee', 'ff', 'ggg'].join('\n\n');
    const { observer, events } = recordingObserver();

    expect(segmentStory(story, 4, observer)).toEqual(['aaaa\nbb', 'cccccc\nd', 'eeeee\nff', 'ggg']);
    expect(eventsOfType(events, 'segmentation.merge')).toHaveLength(1);
  });

  it('truncates a slightly-too-long paragraph list without merging', () => {
    const story = ['P1.', 'P2.', 'P3.', 'P4.', 'P5.'].join('\n\n');
    expect(segmentStory(story, 4)).toEqual(['P1.', 'P2.', 'P3.', 'P4.']);
  });

  it('returns exactly the requested number of pages for every supported length', () => {
    const story = Array.from({ length: 40 }, (_, i) => `Sentence number ${i + 1}.`).join(' ');
    for (let target = 4; target <= 20; target++) {
      expect(segmentStory(story, target)).toHaveLength(target);
    }
  });

  it('returns no pages for empty input', () => {
    expect(segmentStory('   \n\n  ', 4)).toEqual([]);
  });

  it('rejects a non-positive page count', () => {
    expect(() => segmentStory('Some text.', 0)).toThrow(RangeError);
  });
});
