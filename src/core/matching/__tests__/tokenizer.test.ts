import { describe, it, expect } from 'vitest';
import {
  tokenize,
  normalizeForMatching,
  stripQuestionMarks,
  prepareQuestion,
  clean,
} from '../tokenizer.js';

describe('tokenize', () => {
  it('should split on runs of whitespace and keep casing', () => {
    expect(tokenize('  What is   the population\tof Paris ')).toEqual([
      'What', 'is', 'the', 'population', 'of', 'Paris',
    ]);
  });

  it('should keep punctuation attached to words', () => {
    expect(tokenize('urbana-champaign, illinois')).toEqual(['urbana-champaign,', 'illinois']);
  });

  it('should return nothing for blank text', () => {
    expect(tokenize('   \n ')).toEqual([]);
  });
});

describe('normalizeForMatching', () => {
  it('should lower-case every token', () => {
    expect(normalizeForMatching('When WAS Ada born')).toEqual(['when', 'was', 'ada', 'born']);
  });
});

describe('prepareQuestion', () => {
  it('should drop question marks anywhere', () => {
    expect(stripQuestionMarks('what? is this??')).toBe('what is this');
    expect(prepareQuestion('What is the population of Port Halvard?')).toEqual([
      'What', 'is', 'the', 'population', 'of', 'Port', 'Halvard',
    ]);
  });

  it('should drop a standalone question mark token', () => {
    expect(prepareQuestion('bye ?')).toEqual(['bye']);
  });
});

describe('clean', () => {
  it('should replace non-ASCII characters with a space', () => {
    expect(clean('Québec')).toBe('Qu bec');
    expect(clean('1867–1885')).toBe('1867 1885');
  });

  it('should collapse runs of spaces and of newlines', () => {
    expect(clean('a    b\n\n\nc')).toBe('a b\nc');
  });

  it('should collapse spaces produced by replacement', () => {
    expect(clean('x \u00a0 y')).toBe('x y');
  });

  it('should leave printable text alone', () => {
    expect(clean('Undergraduates\n37,140 (2024)[8]')).toBe('Undergraduates\n37,140 (2024)[8]');
  });
});
