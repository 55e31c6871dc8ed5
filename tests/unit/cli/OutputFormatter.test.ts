import { describe, it, expect } from 'vitest';
import { OutputFormatter } from '../../../src/cli/formatters/OutputFormatter.js';
import type { AskResponse } from '../../../src/application/dto/AskResponse.js';

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();
  const response: AskResponse = {
    answer: 'Invoices are sent monthly.',
    conversationId: 3,
    username: 'alice',
    sources: [{ id: 'docs/billing.md#0', source: 'docs/billing.md', score: 0.5 }],
  };

  it('should render an answer with its sources as text', () => {
    expect(formatter.formatAnswer(response, 'text')).toBe([
      'Invoices are sent monthly.',
      '',
      'Sources:',
      '  [1] docs/billing.md#0 (score: 0.5000)',
      '',
      'Conversation: 3 (user: alice)',
    ].join('\n'));
  });

  it('should omit the sources block when nothing was retrieved', () => {
    expect(formatter.formatAnswer({ ...response, sources: [] }, 'text'))
      .toBe('Invoices are sent monthly.\n\nConversation: 3 (user: alice)');
  });

  it('should render answers as JSON', () => {
    expect(JSON.parse(formatter.formatAnswer(response, 'json'))).toEqual(response);
  });

  it('should flatten nested objects to text', () => {
    expect(formatter.formatObject({ filesProcessed: 2, nested: { a: 1 } }, 'text'))
      .toBe('filesProcessed: 2\nnested:\n  a: 1');
  });

  it('should number array items and mark empty lists', () => {
    expect(formatter.formatObject([{ id: 1, title: 'x' }], 'text')).toBe('[0] id: 1\n  title: x');
    expect(formatter.formatObject([], 'text')).toBe('(none)');
  });

  it('should pretty-print JSON', () => {
    expect(formatter.formatObject({ a: 1 }, 'json')).toBe('{\n  "a": 1\n}');
  });
});
