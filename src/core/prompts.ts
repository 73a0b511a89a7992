import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

/**
 * Read `prompts/<name>.txt` and substitute each `{{key}}` placeholder.
 * Templates are read on every call so they can be edited between runs.
 */
export async function renderPrompt(
  name: string,
  values: Readonly<Record<string, string>>,
): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, `${name}.txt`), 'utf-8');

  let rendered = template;
  for (const [key, value] of Object.entries(values)) {
    rendered = rendered.replaceAll(`{{${key}}}`, () => value);
  }
  return rendered.trim();
}
