import { describe, it, expect } from 'vitest';
import { parseCliArgs, CliUsageError } from '../src/args.js';

describe('parseCliArgs', () => {
  it('shows help without arguments', () => {
    expect(parseCliArgs([])).toEqual({ command: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ command: 'help' });
    expect(parseCliArgs(['help', 'forecast'])).toEqual({ command: 'help', topic: 'forecast' });
    expect(parseCliArgs(['delays', '-h'])).toEqual({ command: 'help', topic: 'delays' });
  });

  it('parses a customer question', () => {
    expect(parseCliArgs(['ask', '--role', 'customer', '--as', 'CUST_001', 'where', 'is', 'my', 'order?'])).toEqual({
      command: 'ask',
      question: 'where is my order?',
      options: { role: 'customer', identity: 'CUST_001', json: false, interactive: false },
    });
  });

  it('defaults to the business role', () => {
    const parsed = parseCliArgs(['forecast', '--json', '--as-of', '2026-10-18']);
    expect(parsed).toEqual({
      command: 'forecast',
      options: { role: 'business', identity: 'cli', json: true, interactive: false, asOf: '2026-10-18' },
    });
  });

  it('parses report options', () => {
    const parsed = parseCliArgs(['delays', '--min-overdue', '2', '--window', '5']);
    expect(parsed).toMatchObject({ command: 'delays', options: { minDaysOverdue: 2, atRiskWindowDays: 5 } });
    expect(parseCliArgs(['anomalies', '--days', '14', '--threshold', '1.5']))
      .toMatchObject({ options: { days: 14, threshold: 1.5 } });
  });

  it('takes an order id', () => {
    expect(parseCliArgs(['order', 'ORD_002'])).toMatchObject({ command: 'order', orderId: 'ORD_002' });
  });

  it('allows an interactive session without a question', () => {
    expect(parseCliArgs(['ask', '-i'])).toMatchObject({ command: 'ask', question: '', options: { interactive: true } });
  });

  it('reports usage errors', () => {
    expect(() => parseCliArgs(['ask', '--role', 'customer', 'hi'])).toThrow('--role customer needs --as <customer id>');
    expect(() => parseCliArgs(['ask'])).toThrow('No question provided');
    expect(() => parseCliArgs(['order'])).toThrow('No order id provided');
    expect(() => parseCliArgs(['export'])).toThrow('Unknown command: export');
    expect(() => parseCliArgs(['audit', '--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['ask', '--role', 'admin', 'hi'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['delays', '--window', '-1'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['forecast', '--as-of', 'someday'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['anomalies', '--days', '1e20'])).toThrow('--days must be at most 3650, got "1e20"');
  });
});
