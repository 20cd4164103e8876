import { describe, it, expect } from 'vitest';
import { renderPrompt } from './template';

describe('renderPrompt', () => {
  it('fills placeholders', () => {
    expect(renderPrompt('Call intent: {intent}', { intent: '{"purpose":"renew"}' })).toBe(
      'Call intent: {"purpose":"renew"}',
    );
  });

  it('renders doubled braces as literals', () => {
    expect(renderPrompt('{{ "next": {next} }}', { next: '"END"' })).toBe('{ "next": "END" }');
  });

  it('inserts values verbatim', () => {
    expect(renderPrompt('{v}', { v: '{other} $& $1' })).toBe('{other} $& $1');
  });

  it('leaves lone braces alone', () => {
    expect(renderPrompt('{ not a placeholder', {})).toBe('{ not a placeholder');
  });

  it('throws on a missing variable', () => {
    expect(() => renderPrompt('Hello {who}', {})).toThrow('Missing prompt variable: who');
  });
});
