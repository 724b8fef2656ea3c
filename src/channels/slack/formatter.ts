/**
 * Text conversions between Slack messages and the orchestrator.
 */

const FENCE = '```';
const MENTION_PATTERN = /<@[A-Z0-9]+(?:\|[^>]*)?>/g;

function convertInline(line: string): string {
  return line
    .replace(/^#{1,6}\s+(.+)$/, '*$1*')
    .replace(/^(\s*)[-*]\s+/, '$1• ')
    .replace(/\*\*(.+?)\*\*/g, '*$1*')
    .replace(/__(.+?)__/g, '*$1*')
    .replace(/~~(.+?)~~/g, '~$1~')
    .replace(/\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, '<$2|$1>');
}

/**
 * Convert model markdown to Slack mrkdwn. Fenced code blocks pass through
 * untouched; Slack renders them as is.
 */
export function toSlackMrkdwn(markdown: string): string {
  return markdown
    .split(FENCE)
    .map((segment, index) =>
      index % 2 === 1 ? segment : segment.split('\n').map(convertInline).join('\n'),
    )
    .join(FENCE);
}

/** Remove `<@U123>` user mentions and surrounding whitespace. */
export function stripMentions(text: string): string {
  return text.replace(MENTION_PATTERN, '').replace(/\s{2,}/g, ' ').trim();
}
