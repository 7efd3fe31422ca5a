import { Selector } from './selector';

export const USAGE_TEXT = [
  'Hello! I keep a log of this group and summarize it on request.',
  '',
  'Commands:',
  '/summarize <window> - summarize recent messages',
  '',
  'Time windows: 12hr, 18hr, 1day, 2days, 1week (any number of hr/day/week)',
  'Count windows: last <N> (e.g. last 50)',
  '',
  'Examples:',
  '/summarize 1day',
  '/summarize last 100',
  '',
  'Note: only messages sent while I am in the group can be summarized.',
].join('\n');

export const SUMMARY_FAILED_REPLY =
  "❌ Sorry, I couldn't generate a summary right now. Please try again in a moment.";

export const UNEXPECTED_ERROR_REPLY =
  '❌ Something went wrong while processing your request.';

export function invalidSelectorReply(reason: string): string {
  return [
    `Invalid format. ${reason}`,
    '',
    'Use:',
    '/summarize <time> (e.g. /summarize 1day)',
    '/summarize last <number> (e.g. /summarize last 50)',
  ].join('\n');
}

export function emptyWindowReply(selector: Selector): string {
  return selector.kind === 'count'
    ? 'No messages found in this group. Nothing to summarize.'
    : 'No messages found in the selected time range. Nothing to summarize.';
}

export function summaryReply(description: string, summary: string): string {
  return `📊 Summary for ${description}:\n\n${summary}`;
}
