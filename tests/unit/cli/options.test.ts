import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { commonOptionsSchema, parseOptions, positiveIntOption } from '../../../src/cli/options.js';
import { formatCliError } from '../../../src/cli/errors.js';
import { ConversationNotFoundError } from '../../../src/domain/errors/DomainErrors.js';

describe('CLI options', () => {
  it('should apply defaults', () => {
    expect(parseOptions(commonOptionsSchema, {})).toEqual({ root: '.', format: 'text' });
  });

  it('should coerce numeric options', () => {
    const schema = z.object({ topK: positiveIntOption });
    expect(parseOptions(schema, { topK: '5' })).toEqual({ topK: 5 });
  });

  it('should name the offending option in kebab case', () => {
    const schema = z.object({ topK: positiveIntOption });
    expect(() => parseOptions(schema, { topK: '0' })).toThrow(/^Invalid option --top-k: /);
    expect(() => parseOptions(commonOptionsSchema, { format: 'xml' })).toThrow(/^Invalid option --format: /);
  });
});

describe('formatCliError', () => {
  it('should include the code of domain errors', () => {
    expect(formatCliError(new ConversationNotFoundError(9)))
      .toBe('Error [CONVERSATION_NOT_FOUND]: Conversation 9 not found');
  });

  it('should print plain errors and unknown values', () => {
    expect(formatCliError(new Error('question must not be empty'))).toBe('Error: question must not be empty');
    expect(formatCliError(42)).toBe('Error: Unknown error');
  });
});
