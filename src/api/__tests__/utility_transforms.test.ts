import { describe, it, expect } from 'vitest';
import {
  UtilityStage,
  buildUtilityPrompt,
  containsPersian,
  extractTargetLanguage,
  inferTargetLanguage,
} from '../utility_transforms.js';
import { InvalidArgumentError, UtilityError } from '../../core/errors.js';
import type { CompletionProvider } from '../../providers/types.js';
import { failingCompletion, scriptedCompletion } from '../../__tests__/pipeline_fixtures.js';

describe('language helpers', () => {
  it('detects Persian script', () => {
    expect(containsPersian('سلام دنیا')).toBe(true);
    expect(containsPersian('hello world')).toBe(false);
  });

  it('infers the opposite language of the text', () => {
    expect(inferTargetLanguage('این یک قرارداد است')).toBe('English');
    expect(inferTargetLanguage('This is a contract')).toBe('Persian');
  });

  it('extracts an explicit target language', () => {
    expect(extractTargetLanguage('Translate this into french please')).toBe('French');
    expect(extractTargetLanguage('translate to German')).toBe('German');
    expect(extractTargetLanguage('ترجمه کن به انگلیسی')).toBe('English');
    expect(extractTargetLanguage('این را به فارسی ترجمه کن')).toBe('Persian');
  });

  it('ignores words after "to" that are not languages', () => {
    expect(extractTargetLanguage('I want to translate this')).toBeUndefined();
  });
});

describe('buildUtilityPrompt', () => {
  it('asks for the configured number of summary sentences', () => {
    const prompt = buildUtilityPrompt('SUMMARIZE', '  Body text.  ', { summarySentences: 3 });

    expect(prompt).toContain('at most 3 sentences');
    expect(prompt.endsWith('TEXT:\nBody text.')).toBe(true);
  });

  it('names the target language for translations', () => {
    const prompt = buildUtilityPrompt('TRANSLATE', 'Hello', { summarySentences: 5, targetLanguage: 'Spanish' });

    expect(prompt).toContain('Translate the following text into Spanish.');
    expect(prompt).toContain('Preserve the meaning and the formatting');
  });

  it('requests a Markdown checklist', () => {
    const prompt = buildUtilityPrompt('CHECKLIST', 'Call the vendor.', { summarySentences: 5 });

    expect(prompt).toContain('"- [ ] item"');
  });
});

describe('UtilityStage', () => {
  it('returns the trimmed completion', async () => {
    const { provider, complete } = scriptedCompletion('  - [ ] Call the vendor\n');
    const stage = new UtilityStage(provider);

    await expect(stage.execute('CHECKLIST', 'We must call the vendor.')).resolves.toBe('- [ ] Call the vendor');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('passes the summary length through to the prompt', async () => {
    const { provider, complete } = scriptedCompletion('Short.');
    const stage = new UtilityStage(provider, { summarySentences: 2 });

    await stage.execute('SUMMARIZE', 'Long text.');

    expect(complete.mock.calls[0]?.[0]).toContain('at most 2 sentences');
  });

  it('rejects TRANSLATE without a target language', async () => {
    const { provider, complete } = scriptedCompletion('unused');
    const stage = new UtilityStage(provider);

    await expect(stage.execute('TRANSLATE', 'Hello')).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(stage.execute('TRANSLATE', 'Hello', '  ')).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('rejects blank text', async () => {
    const { provider } = scriptedCompletion('unused');
    const stage = new UtilityStage(provider);

    await expect(stage.execute('SUMMARIZE', ' \n ')).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('raises UtilityError when the provider fails, without retrying', async () => {
    const { provider, complete } = failingCompletion(new Error('quota exceeded'));
    const stage = new UtilityStage(provider);

    const error: unknown = await stage.execute('SUMMARIZE', 'Some text').then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(UtilityError);
    expect(error instanceof UtilityError ? error.message : '').toBe('Utility SUMMARIZE failed: quota exceeded');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('raises UtilityError on timeout', async () => {
    const hanging: CompletionProvider = { complete: () => new Promise<string>(() => {}) };
    const stage = new UtilityStage(hanging, { completionTimeoutMs: 20 });

    await expect(stage.execute('TRANSLATE', 'Hello', 'French')).rejects.toThrow(
      'Utility TRANSLATE failed: TRANSLATE completion timed out after 20ms'
    );
  });

  it('raises UtilityError for an empty response', async () => {
    const { provider } = scriptedCompletion('');
    const stage = new UtilityStage(provider);

    await expect(stage.execute('CHECKLIST', 'text')).rejects.toBeInstanceOf(UtilityError);
  });
});
