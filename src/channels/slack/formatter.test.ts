import { describe, it, expect } from 'vitest';
import { stripMentions, toSlackMrkdwn } from './formatter.js';

describe('toSlackMrkdwn', () => {
  it('turns headings into bold lines', () => {
    expect(toSlackMrkdwn('## Summary\nAll good')).toBe('*Summary*\nAll good');
  });

  it('converts bold and strikethrough', () => {
    expect(toSlackMrkdwn('This is **important** and ~~old~~')).toBe('This is *important* and ~old~');
    expect(toSlackMrkdwn('__also bold__')).toBe('*also bold*');
  });

  it('converts bullet lists and keeps indentation', () => {
    expect(toSlackMrkdwn('- item one\n  * nested')).toBe('• item one\n  • nested');
  });

  it('converts links', () => {
    expect(toSlackMrkdwn('See [docs](https://example.com/a)')).toBe('See <https://example.com/a|docs>');
  });

  it('leaves fenced code untouched', () => {
    const text = 'Run:\n```\n**not bold**\n- not a list\n```\nDone **now**';

    expect(toSlackMrkdwn(text)).toBe('Run:\n```\n**not bold**\n- not a list\n```\nDone *now*');
  });
});

describe('stripMentions', () => {
  it('removes user mentions', () => {
    expect(stripMentions('<@U123ABC> what is the sprint status?')).toBe('what is the sprint status?');
  });

  it('collapses the gaps mentions leave behind', () => {
    expect(stripMentions('<@U1> hi <@U2|bob> there')).toBe('hi there');
  });

  it('returns an empty string for a bare mention', () => {
    expect(stripMentions('<@U123ABC>')).toBe('');
  });
});
