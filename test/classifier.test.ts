import { describe, expect, it } from 'vitest';
import { ChallengeClassifier, detectVariant, matchTarget } from '../src/classifier.js';
import { DEFAULT_TARGET_TERMS } from '../src/config.js';
import { NotFoundError } from '../src/errors.js';
import { FakeWidget } from './helpers/fake-widget.js';

function classifierFor(widget: FakeWidget) {
  widget.frame = 'challenge';
  return new ChallengeClassifier(widget, DEFAULT_TARGET_TERMS, 1000);
}

describe('matchTarget', () => {
  it('maps known terms to detector class ids', () => {
    expect(matchTarget('traffic lights', DEFAULT_TARGET_TERMS)).toBe(9);
    expect(matchTarget('bicycles', DEFAULT_TARGET_TERMS)).toBe(1);
    expect(matchTarget('a fire hydrant', DEFAULT_TARGET_TERMS)).toBe(10);
    expect(matchTarget('Buses', DEFAULT_TARGET_TERMS)).toBe(5);
  });

  it('returns null for unknown terms', () => {
    expect(matchTarget('chimneys', DEFAULT_TARGET_TERMS)).toBeNull();
  });

  it('takes the first matching row of the table', () => {
    expect(matchTarget('bus', [{ term: 'bus', classId: 5 }, { term: 'bu', classId: 99 }])).toBe(5);
  });
});

describe('detectVariant', () => {
  it('reads the variant from the instruction wording', () => {
    expect(detectVariant('Select all squares with motorcycles')).toBe('squares');
    expect(detectVariant('Select all images with cars Click verify once there are none left.')).toBe('dynamic');
    expect(detectVariant('Select all images with boats')).toBe('selection');
  });
});

describe('ChallengeClassifier', () => {
  it('classifies a traffic light selection challenge', async () => {
    const widget = new FakeWidget([{ target: 'traffic lights' }]);
    const result = await classifierFor(widget).classify();
    expect(result).toEqual({
      kind: 'recognized',
      challenge: { targetClass: 9, variant: 'selection', gridSize: 3 },
      instruction: 'Select all images with traffic lights',
    });
  });

  it('gives squares challenges a 4x4 grid', async () => {
    const widget = new FakeWidget([{ target: 'motorcycles', instruction: 'Select all squares with motorcycles' }]);
    const result = await classifierFor(widget).classify();
    expect(result.kind).toBe('recognized');
    if (result.kind === 'recognized') {
      expect(result.challenge).toEqual({ targetClass: 3, variant: 'squares', gridSize: 4 });
    }
  });

  it('reports unknown targets without throwing', async () => {
    const widget = new FakeWidget([{ target: 'chimneys' }]);
    await expect(classifierFor(widget).classify()).resolves.toEqual({
      kind: 'unrecognized',
      instruction: 'Select all images with chimneys',
    });
  });

  it('honours a custom term table', async () => {
    const widget = new FakeWidget([{ target: 'chimneys' }]);
    widget.frame = 'challenge';
    const classifier = new ChallengeClassifier(widget, [{ term: 'chimney', classId: 42 }], 1000);
    const result = await classifier.classify();
    expect(result.kind === 'recognized' && result.challenge.targetClass).toBe(42);
  });

  it('fails with NotFoundError outside the challenge frame', async () => {
    const widget = new FakeWidget([{ target: 'cars' }]);
    const classifier = new ChallengeClassifier(widget, DEFAULT_TARGET_TERMS, 1000);
    await expect(classifier.classify()).rejects.toBeInstanceOf(NotFoundError);
  });
});
