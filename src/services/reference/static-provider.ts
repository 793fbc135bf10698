// ═══════════════════════════════════════════════════════════════════════════════
// STATIC PROVIDER — Fact Blocks from Memory or a JSON File
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ok, err, type AsyncResult } from '../../types/result.js';
import { subjectNotFound, noFactBlock, type LookupError } from '../../core/extraction/errors.js';
import type { DocumentProvider } from '../../core/rules/types.js';
import { clean } from '../../core/matching/tokenizer.js';

/** `{ "<subject>": "<fact block text>" }` */
export const FactBlockFileSchema = z.record(z.string().min(1), z.string());

function keyOf(subject: string): string {
  return subject.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Subjects are looked up case-insensitively with whitespace collapsed.
 */
export class StaticDocumentProvider implements DocumentProvider {
  readonly name = 'static';
  private readonly blocks: ReadonlyMap<string, string>;

  constructor(blocks: Readonly<Record<string, string>>) {
    this.blocks = new Map(
      Object.entries(blocks).map(([subject, text]) => [keyOf(subject), text])
    );
  }

  static async fromFile(path: string): Promise<StaticDocumentProvider> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const parsed = FactBlockFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid fact block file ${path}: ${parsed.error.errors[0]?.message ?? 'unknown error'}`);
    }
    return new StaticDocumentProvider(parsed.data);
  }

  get subjects(): string[] {
    return [...this.blocks.keys()];
  }

  async fetchFactBlock(subject: string): AsyncResult<string, LookupError> {
    const text = this.blocks.get(keyOf(subject));
    if (text === undefined) {
      return err(subjectNotFound(subject));
    }
    if (text.trim().length === 0) {
      return err(noFactBlock(subject));
    }
    return ok(clean(text));
  }
}
