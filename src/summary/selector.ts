import { ValidationError } from './summary.errors';

export type DurationUnit = 'hour' | 'day' | 'week';

/** Parsed window request. */
export type Selector =
  | { kind: 'duration'; magnitude: number; unit: DurationUnit }
  | { kind: 'count'; count: number };

export interface SelectorLimits {
  maxCount: number;
  maxWindowHours: number;
}

export const UNIT_HOURS: Record<DurationUnit, number> = {
  hour: 1,
  day: 24,
  week: 24 * 7,
};

const UNIT_ALIASES = new Map<string, DurationUnit>([
  ['hr', 'hour'],
  ['hrs', 'hour'],
  ['hour', 'hour'],
  ['hours', 'hour'],
  ['day', 'day'],
  ['days', 'day'],
  ['week', 'week'],
  ['weeks', 'week'],
]);

const DURATION_RE = /^(\d+)\s*([a-z]+)$/;
const COUNT_RE = /^last\s+(\d+)$/;

/**
 * Parses `<N>hr`, `<N>day`, `<N>week` (plural and `hour` spellings too) or
 * `last <N>`. Case and surrounding whitespace are ignored.
 *
 * @throws ValidationError for anything outside that grammar, a zero
 * magnitude, or a window past the configured limits
 */
export function parseSelector(raw: string, limits: SelectorLimits): Selector {
  const text = raw.trim().toLowerCase();
  if (!text) {
    throw new ValidationError('Missing window. Give a duration or "last <N>".');
  }

  const count = COUNT_RE.exec(text);
  if (count) {
    const n = toPositiveInt(count[1]);
    if (n > limits.maxCount) {
      throw new ValidationError(
        `Maximum count is ${limits.maxCount} messages.`,
      );
    }
    return { kind: 'count', count: n };
  }

  const duration = DURATION_RE.exec(text);
  const unit = duration ? UNIT_ALIASES.get(duration[2]) : undefined;
  if (!duration || !unit) {
    throw new ValidationError(`Unrecognized window "${raw.trim()}".`);
  }

  const magnitude = toPositiveInt(duration[1]);
  if (magnitude * UNIT_HOURS[unit] > limits.maxWindowHours) {
    throw new ValidationError(
      `Maximum window is ${limits.maxWindowHours} hours.`,
    );
  }
  return { kind: 'duration', magnitude, unit };
}

function toPositiveInt(digits: string): number {
  const n = Number(digits);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new ValidationError('The number must be a positive integer.');
  }
  return n;
}

export function selectorDurationMs(
  selector: Extract<Selector, { kind: 'duration' }>,
): number {
  return selector.magnitude * UNIT_HOURS[selector.unit] * 3600_000;
}

/** Human-readable window, e.g. `last 12 hours` or `last 50 messages`. */
export function describeSelector(selector: Selector): string {
  if (selector.kind === 'count') {
    return `last ${selector.count} ${selector.count === 1 ? 'message' : 'messages'}`;
  }
  const plural = selector.magnitude === 1 ? '' : 's';
  return `last ${selector.magnitude} ${selector.unit}${plural}`;
}
