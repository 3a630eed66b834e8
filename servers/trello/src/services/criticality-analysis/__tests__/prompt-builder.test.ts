/**
 * PromptBuilderService Unit Tests
 */

import { PromptBuilderService, truncate } from '../services/prompt-builder.service';
import { ContextBundle } from '../models/context.model';
import { EMPTY_CONTEXT, makeCard } from './fixtures';

describe('PromptBuilderService', () => {
  const builder = new PromptBuilderService(40);

  it('should render every card field', () => {
    const card = makeCard('c1', {
      title: 'Checkout fails',
      description: 'Payment page returns 500',
      due: '2024-03-20T12:00:00.000Z',
      labels: [{ name: 'Bug', color: 'red' }, { name: '', color: 'blue' }],
      members: ['Ana', 'Lee'],
    });

    const lines = builder.build([{ card, context: EMPTY_CONTEXT }]).split('\n');

    expect(lines).toEqual(
      expect.arrayContaining([
        '=== CARD 1/1 ===',
        'ID: c1',
        'Title: Checkout fails',
        'Description: Payment page returns 500',
        'Due: 2024-03-20T12:00:00.000Z',
        'List: Inbox',
        'Labels: Bug, blue',
        'Members: Ana, Lee',
        'Board: Support board',
        'URL: https://trello.example/c/c1',
      ])
    );
  });

  it('should show placeholders for missing fields', () => {
    const card = makeCard('c1', { description: '  ' });

    const lines = builder.build([{ card, context: EMPTY_CONTEXT }]).split('\n');

    expect(lines).toEqual(
      expect.arrayContaining(['Description: (no description)', 'Due: none', 'Labels: none', 'Members: none'])
    );
  });

  it('should truncate long descriptions', () => {
    const card = makeCard('c1', { description: 'x'.repeat(50) });

    const prompt = builder.build([{ card, context: EMPTY_CONTEXT }]);

    expect(prompt).toContain(`Description: ${'x'.repeat(40)}...\n`);
  });

  it('should render empty and unavailable context as neutral sentences', () => {
    const context: ContextBundle = {
      documents: { status: 'unavailable', reason: 'ECONNREFUSED' },
      similarAnalyses: { status: 'empty' },
    };

    const prompt = builder.build([{ card: makeCard('c1'), context }]);

    expect(prompt).toContain('Project documentation:\nDocumentation search is unavailable for this card.\n');
    expect(prompt).toContain('Similar past analyses:\nNo similar past analyses.');
    expect(prompt).not.toContain('ECONNREFUSED');
  });

  it('should render documents and similar analyses with scores', () => {
    const context: ContextBundle = {
      documents: { status: 'available', items: [{ text: 'SLA:\n payments  must work', score: 0.876, source: 'sla.md' }] },
      similarAnalyses: {
        status: 'available',
        items: [
          {
            cardId: 'old1',
            title: 'Payments down',
            summary: 'Payments down',
            criticalityLevel: 'HIGH',
            isCritical: true,
            justification: 'Revenue impact',
            score: 0.9,
          },
          {
            title: 'Typo',
            summary: 'Typo',
            criticalityLevel: 'LOW',
            isCritical: false,
            justification: 'Cosmetic',
            score: 0.5,
          },
        ],
      },
    };

    const lines = builder.build([{ card: makeCard('c1'), context }]).split('\n');

    expect(lines).toEqual(
      expect.arrayContaining([
        '- [0.88] SLA: payments must work (source: sla.md)',
        '- [0.90] "Payments down": critical HIGH - Revenue impact',
        '- [0.50] "Typo": not critical - Cosmetic',
      ])
    );
  });

  it('should include the previous assessment on re-analysis', () => {
    const prompt = builder.build([
      {
        card: makeCard('c1'),
        context: EMPTY_CONTEXT,
        previous: {
          criticalityLevel: 'MEDIUM',
          isCritical: true,
          justification: 'Slow pages',
          analyzedAt: '2024-03-10T09:00:00.000Z',
        },
      },
    ]);

    expect(prompt).toContain('Previous assessment (2024-03-10T09:00:00.000Z): critical MEDIUM - Slow pages');
  });

  it('should keep card order and end with the grammar and expected ids', () => {
    const prompt = builder.build([
      { card: makeCard('c2'), context: EMPTY_CONTEXT },
      { card: makeCard('c1'), context: EMPTY_CONTEXT },
    ]);

    expect(prompt.indexOf('=== CARD 1/2 ===\nID: c2')).toBeGreaterThan(-1);
    expect(prompt.indexOf('ID: c2')).toBeLessThan(prompt.indexOf('ID: c1'));
    expect(prompt).toContain('<CARD_ID> OUI <HIGH|MEDIUM|LOW> <justification>\n<CARD_ID> NON <justification>');
    expect(prompt.endsWith('Expected card ids: c2, c1')).toBe(true);
  });

  it('should be deterministic', () => {
    const entries = [{ card: makeCard('c1'), context: EMPTY_CONTEXT }];
    expect(builder.build(entries)).toBe(builder.build(entries));
  });

  describe('truncate', () => {
    it('should leave short text alone', () => {
      expect(truncate('short', 10)).toBe('short');
    });

    it('should cut long text and mark it', () => {
      expect(truncate('abcdefghij', 4)).toBe('abcd...');
    });
  });
});
