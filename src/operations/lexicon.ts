import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

// ── Lexicon shape ────────────────────────────────────────────

const keywordTableSchema = z.record(z.array(z.string().min(1)).min(1));

export const reviewLexiconSchema = z.object({
  complaintPatterns: z.array(z.string().min(1)).min(1),
  praisePatterns: z.array(z.string().min(1)).min(1),
  issueCategories: keywordTableSchema,
  praiseThemes: keywordTableSchema,
  themeKeywords: z.array(z.string().min(1)).min(1),
});

export type ReviewLexiconFile = z.infer<typeof reviewLexiconSchema>;

export interface ReviewLexicon {
  complaintPatterns: RegExp[];
  praisePatterns: RegExp[];
  issueCategories: Record<string, string[]>;
  praiseThemes: Record<string, string[]>;
  themeKeywords: string[];
}

// ── Loading ──────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_LEXICON_PATH = path.join(THIS_DIR, '..', '..', 'data', 'review-lexicon.json');

export async function loadLexicon(lexiconPath = DEFAULT_LEXICON_PATH): Promise<ReviewLexicon> {
  const raw = await readFile(lexiconPath, 'utf-8');
  return compileLexicon(reviewLexiconSchema.parse(JSON.parse(raw)));
}

export function compileLexicon(file: ReviewLexiconFile): ReviewLexicon {
  return {
    complaintPatterns: file.complaintPatterns.map((p) => new RegExp(p, 'i')),
    praisePatterns: file.praisePatterns.map((p) => new RegExp(p, 'i')),
    issueCategories: file.issueCategories,
    praiseThemes: file.praiseThemes,
    themeKeywords: file.themeKeywords,
  };
}
