// ═══════════════════════════════════════════════════════════════════════════════
// FIELD EXTRACTOR TESTS — Built-in Templates Against Summary Box Text
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { extractField } from '../extractor.js';
import {
  compileTemplate,
  POLAR_RADIUS_TEMPLATE,
  BIRTH_DATE_TEMPLATE,
  POPULATION_TEMPLATE,
  ESTABLISHED_TEMPLATE,
  UNDERGRADUATES_TEMPLATE,
} from '../templates.js';
import { LookupErrorCode } from '../errors.js';
import type { ExtractionTemplate } from '../templates.js';

function valueOf(text: string, template: ExtractionTemplate): string | undefined {
  const result = extractField(text, template);
  return result.ok ? result.value : undefined;
}

describe('extractField', () => {
  describe('established', () => {
    it('should stop the year at the semicolon', () => {
      const block = 'TypePublic universityEstablished\n1867; 158 years ago (1867)Parent institution';
      expect(valueOf(block, ESTABLISHED_TEMPLATE)).toBe('1867');
    });

    it('should capture a full date up to the opening parenthesis', () => {
      const block = 'EstablishedOctober 28, 1636 (388 years ago) (1636-10-28)[4]Founder';
      expect(valueOf(block, ESTABLISHED_TEMPLATE)).toBe('October 28, 1636 ');
    });
  });

  describe('undergraduates', () => {
    it('should keep thousands separators verbatim', () => {
      expect(valueOf('Undergraduates\n37,140', UNDERGRADUATES_TEMPLATE)).toBe('37,140');
    });

    it('should stop before a trailing note', () => {
      expect(valueOf('Students59,238 (2024)[8]Undergraduates37,140 (2024)[8]', UNDERGRADUATES_TEMPLATE))
        .toBe('37,140');
    });

    it('should match the heading case-insensitively', () => {
      expect(valueOf('undergraduates 1,200', UNDERGRADUATES_TEMPLATE)).toBe('1,200');
    });

    it('should clean the text before matching', () => {
      expect(valueOf('Undergraduates\n\n\n  42', UNDERGRADUATES_TEMPLATE)).toBe('42');
    });
  });

  describe('population', () => {
    it('should skip a citation glued to the number', () => {
      expect(valueOf('Population (Jan 2025[3])2,048,472 Rank9th', POPULATION_TEMPLATE)).toBe('2,048,472');
    });

    it('should skip a label between the year and the number', () => {
      expect(valueOf('Population (2021) \nTotal8,501,833[2] Estimate', POPULATION_TEMPLATE)).toBe('8,501,833');
    });
  });

  describe('birth date', () => {
    it('should find an ISO date after the heading', () => {
      expect(valueOf('Born(1894-07-22)22 July 1894Port Halvard', BIRTH_DATE_TEMPLATE)).toBe('1894-07-22');
    });

    it('should fail on a date in another format', () => {
      const result = extractField('Born22 July 1894', BIRTH_DATE_TEMPLATE);
      expect(result.ok).toBe(false);
    });
  });

  describe('polar radius', () => {
    it('should take the number before km', () => {
      expect(valueOf('Equatorial radius32,050 kmPolar radius30,420 kmFlattening', POLAR_RADIUS_TEMPLATE))
        .toBe('30,420');
    });

    it('should handle an uncertainty written with a non-ASCII sign', () => {
      expect(valueOf('Polar radius3376.2 ± 0.1 km', POLAR_RADIUS_TEMPLATE)).toBe('3376.2');
    });
  });

  it('should fail with the template label when nothing matches', () => {
    const result = extractField('Nothing useful here', UNDERGRADUATES_TEMPLATE);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(LookupErrorCode.FIELD_NOT_FOUND);
      expect(result.error.message).toBe('Page infobox has no information on undergraduate population');
      expect(result.error.context).toEqual({ field: 'undergraduates' });
    }
  });

  it('should return the same value on repeated calls', () => {
    const block = 'Population (2020[1])412,906 Rank4th';
    expect(valueOf(block, POPULATION_TEMPLATE)).toBe('412,906');
    expect(valueOf(block, POPULATION_TEMPLATE)).toBe('412,906');
  });
});

describe('compileTemplate', () => {
  it('should compile case-insensitive with dotAll', () => {
    const template = compileTemplate('motto', 'Motto(?<motto>[^\\n]+)', 'No motto');
    expect(template.pattern.flags).toBe('is');
    expect(valueOf('MOTTOLux in tenebris', template)).toBe('Lux in tenebris');
  });

  it('should let a field span lines', () => {
    const template = compileTemplate('motto', 'Motto(?<motto>.+?)Type', 'No motto');
    expect(valueOf('MottoLux\nin tenebrisType', template)).toBe('Lux\nin tenebris');
  });

  it('should reject a pattern without the named group', () => {
    expect(() => compileTemplate('motto', 'Motto(?<other>.+)', 'No motto')).toThrow(TypeError);
  });

  it('should freeze the template', () => {
    expect(Object.isFrozen(POPULATION_TEMPLATE)).toBe(true);
  });
});
