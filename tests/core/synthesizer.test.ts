import { describe, expect, it } from 'vitest';

import {
  formatHistory,
  formatResult,
  synthesize,
  truncate,
  TRUNCATION_MARKER,
} from '../../src/core/synthesizer.js';
import { APOLOGY_ANSWER } from '../../src/config/defaults.js';
import { createMockClient } from '../../src/llm/index.js';
import { errorRecord } from '../../src/schema/history.js';
import { setVerbose } from '../../src/utils/logger.js';
import { searchRecord } from '../helpers.js';

setVerbose(false);

describe('truncate', () => {
  it('cuts long text and appends the marker', () => {
    const text = truncate('x'.repeat(3005));
    expect(text).toBe('x'.repeat(3000) + TRUNCATION_MARKER);
  });

  it('leaves short text alone', () => {
    expect(truncate('short')).toBe('short');
  });
});

describe('formatResult', () => {
  it('falls back to the matches when the summary is blank', () => {
    expect(formatResult({ summary: ' ', matches: [{ product_name: 'Alpha Speaker' }] })).toBe(
      '[{"product_name":"Alpha Speaker"}]',
    );
  });
});

describe('formatHistory', () => {
  it('keeps successful records only', () => {
    const history = [
      searchRecord(['Alpha Speaker']),
      errorRecord(1, 'operation_failure', 'boom', 'calculate_statistics', {}),
    ];
    expect(formatHistory(history)).toBe('**Step 1: search_products**\nFound 1 product(s)');
  });
});

describe('synthesize', () => {
  it('passes the goal and formatted results to the oracle', async () => {
    const client = createMockClient(['  Buy the speaker.  ']);
    const answer = await synthesize(client, 'Pick a speaker', [searchRecord(['Alpha Speaker'])]);

    expect(answer).toBe('Buy the speaker.');
    const prompt = client.calls[0]?.userPrompt ?? '';
    expect(prompt).toContain("User's Original Goal: Pick a speaker");
    expect(prompt).toContain('**Step 1: search_products**\nFound 1 product(s)');
  });

  it('answers with the apology when the oracle returns nothing', async () => {
    const client = createMockClient(['   ']);
    expect(await synthesize(client, 'Pick a speaker', [])).toBe(APOLOGY_ANSWER);
  });
});
