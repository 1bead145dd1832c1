/**
 * Spanish Number Lexicon
 *
 * Number words 0-999 with a fingerprint index (length + first letter +
 * last letter). Loaded once from data/spanish-numbers.json; entries and
 * indexes are frozen after construction and shared across documents.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/lexicon/lexicon
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  type Fingerprint,
  type LexiconEntry,
  type LexiconInfo,
  fingerprintKey,
  fingerprintOf,
} from '../../models/lexicon.js';
import { ResolverError } from '../../server/errors.js';

const MAX_VALUE = 999;

const LexiconFileSchema = z.object({
  language: z.string().min(1),
  entries: z
    .array(
      z.object({
        word: z
          .string()
          .regex(/^[a-z]+$/, 'Lexicon words must be lowercase, accent-free and a-z only'),
        value: z.number().int().min(0).max(MAX_VALUE),
      })
    )
    .min(1, 'Lexicon must contain at least one word'),
});

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** data/ sits at the package root, three levels above src/services/lexicon (or dist/...) */
export const DEFAULT_LEXICON_PATH = path.resolve(__dirname, '..', '..', '..', 'data', 'spanish-numbers.json');

export class Lexicon {
  readonly language: string;
  readonly entries: readonly LexiconEntry[];
  private readonly byWord: ReadonlyMap<string, LexiconEntry>;
  private readonly byFingerprint: ReadonlyMap<string, readonly LexiconEntry[]>;

  /**
   * @param source - parsed JSON of data/spanish-numbers.json; validated here
   */
  constructor(source: unknown) {
    const parsed = LexiconFileSchema.safeParse(source);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ResolverError('LEXICON_ERROR', `Invalid lexicon: ${issues.join('; ')}`);
    }

    const entries: LexiconEntry[] = [];
    const byWord = new Map<string, LexiconEntry>();
    const byFingerprint = new Map<string, LexiconEntry[]>();

    for (const { word, value } of parsed.data.entries) {
      if (byWord.has(word)) {
        throw new ResolverError('LEXICON_ERROR', `Duplicate lexicon word: "${word}"`, { word });
      }
      const entry: LexiconEntry = Object.freeze({ word, value, ...fingerprintOf(word) });
      entries.push(entry);
      byWord.set(word, entry);

      const key = fingerprintKey(entry);
      const bucket = byFingerprint.get(key);
      if (bucket) {
        bucket.push(entry);
      } else {
        byFingerprint.set(key, [entry]);
      }
    }

    for (const bucket of byFingerprint.values()) Object.freeze(bucket);

    this.language = parsed.data.language;
    this.entries = Object.freeze(entries);
    this.byWord = byWord;
    this.byFingerprint = byFingerprint;
    Object.freeze(this);
  }

  /**
   * Load and validate a lexicon JSON file
   */
  static fromFile(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new ResolverError('LEXICON_ERROR', `Cannot read lexicon file: ${filePath}`, {
        path: filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ResolverError('LEXICON_ERROR', `Lexicon file is not valid JSON: ${filePath}`, {
        path: filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    return new Lexicon(data);
  }

  /** Exact lookup of a normalized word */
  lookup(word: string): LexiconEntry | undefined {
    return this.byWord.get(word);
  }

  /** All entries sharing a fingerprint, in lexicon order */
  withFingerprint(fp: Fingerprint): readonly LexiconEntry[] {
    return this.byFingerprint.get(fingerprintKey(fp)) ?? [];
  }

  /** The single entry for a fingerprint, or undefined when absent or ambiguous */
  uniqueFingerprint(fp: Fingerprint): LexiconEntry | undefined {
    const bucket = this.withFingerprint(fp);
    return bucket.length === 1 ? bucket[0] : undefined;
  }

  info(): LexiconInfo {
    let uniqueFingerprints = 0;
    for (const bucket of this.byFingerprint.values()) {
      if (bucket.length === 1) uniqueFingerprints++;
    }
    let minValue = MAX_VALUE;
    let maxValue = 0;
    for (const entry of this.entries) {
      minValue = Math.min(minValue, entry.value);
      maxValue = Math.max(maxValue, entry.value);
    }
    return {
      words: this.entries.length,
      fingerprints: this.byFingerprint.size,
      uniqueFingerprints,
      minValue,
      maxValue,
    };
  }
}

let _defaultLexicon: Lexicon | null = null;

/**
 * Process-wide Spanish lexicon, read from disk on first use.
 */
export function getDefaultLexicon(): Lexicon {
  if (!_defaultLexicon) {
    _defaultLexicon = Lexicon.fromFile();
    const info = _defaultLexicon.info();
    console.error(
      `[Lexicon] Loaded ${info.words} words, ${info.fingerprints} fingerprints (${info.uniqueFingerprints} unique)`
    );
  }
  return _defaultLexicon;
}
