// ═══════════════════════════════════════════════════════════════════════════════
// RULE REGISTRY — Ordered, Immutable Pattern → Action Table
// ═══════════════════════════════════════════════════════════════════════════════

import { tokenize } from '../matching/tokenizer.js';
import {
  BIRTH_DATE_TEMPLATE,
  POLAR_RADIUS_TEMPLATE,
  ESTABLISHED_TEMPLATE,
  POPULATION_TEMPLATE,
  UNDERGRADUATES_TEMPLATE,
  type ExtractionTemplate,
} from '../extraction/templates.js';
import { FactLookupAction, type AnswerPhrase } from './actions.js';
import type { DocumentProvider, Rule } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Rules in priority order: the first rule whose pattern matches wins, even if a
 * later one would also match.
 */
export class RuleRegistry {
  private readonly rules: readonly Rule[];

  constructor(rules: readonly Rule[]) {
    const names = new Set<string>();
    for (const rule of rules) {
      if (rule.pattern.length === 0) {
        throw new TypeError(`Rule "${rule.name}" has an empty pattern`);
      }
      if (names.has(rule.name)) {
        throw new TypeError(`Duplicate rule name "${rule.name}"`);
      }
      names.add(rule.name);
    }

    this.rules = Object.freeze(
      rules.map(rule => Object.freeze({ ...rule, pattern: Object.freeze([...rule.pattern]) }))
    );
  }

  get size(): number {
    return this.rules.length;
  }

  entries(): readonly Rule[] {
    return this.rules;
  }

  /**
   * Human-readable question shapes, e.g. "what is the population of %".
   */
  describe(): string[] {
    return this.rules.map(rule => rule.pattern.join(' '));
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULT TABLE
// ─────────────────────────────────────────────────────────────────────────────────

export interface LookupSpec {
  name: string;
  pattern: string;
  template: ExtractionTemplate;
  phrase: AnswerPhrase;
}

const wasEstablished: AnswerPhrase = (subject, value) => `${subject} was established in ${value}`;

export const DEFAULT_LOOKUPS: readonly LookupSpec[] = [
  {
    name: 'birth-date',
    pattern: 'when was % born',
    template: BIRTH_DATE_TEMPLATE,
    phrase: (subject, value) => `${subject} was born on this date: ${value}`,
  },
  {
    name: 'polar-radius',
    pattern: 'what is the polar radius of %',
    template: POLAR_RADIUS_TEMPLATE,
    phrase: (subject, value) => `the polar radius of ${subject} is ${value} km`,
  },
  {
    name: 'established-when',
    pattern: 'when was % established',
    template: ESTABLISHED_TEMPLATE,
    phrase: wasEstablished,
  },
  {
    name: 'population',
    pattern: 'what is the population of %',
    template: POPULATION_TEMPLATE,
    phrase: (subject, value) => `${subject} has a population of ${value}`,
  },
  {
    name: 'established-year',
    pattern: 'what year was % established',
    template: ESTABLISHED_TEMPLATE,
    phrase: wasEstablished,
  },
  {
    name: 'undergraduate-population',
    pattern: 'what is the undergraduate population of %',
    template: UNDERGRADUATES_TEMPLATE,
    phrase: (subject, value) => `${subject} has an undergraduate population of ${value}`,
  },
];

export const EXIT_KEYWORD = 'bye';

export function createDefaultRegistry(provider: DocumentProvider): RuleRegistry {
  const lookups = DEFAULT_LOOKUPS.map((lookup): Rule => ({
    kind: 'lookup',
    name: lookup.name,
    pattern: tokenize(lookup.pattern),
    action: new FactLookupAction(provider, lookup.template, lookup.phrase),
  }));

  return new RuleRegistry([
    ...lookups,
    { kind: 'exit', name: 'exit', pattern: [EXIT_KEYWORD] },
  ]);
}
