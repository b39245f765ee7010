/**
 * Parser for textual datetime patterns such as `yyyy-MM-dd HH:mm:ss`.
 *
 * Supported tokens: yyyy MM dd HH mm ss SSS. Text inside single quotes is
 * literal (`''` is a quote); any other character must match itself.
 * Values are read as UTC.
 */

type Field = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'millis';

const TOKENS: ReadonlyArray<{ token: string; field: Field; digits: number }> = [
  { token: 'yyyy', field: 'year', digits: 4 },
  { token: 'SSS', field: 'millis', digits: 3 },
  { token: 'MM', field: 'month', digits: 2 },
  { token: 'dd', field: 'day', digits: 2 },
  { token: 'HH', field: 'hour', digits: 2 },
  { token: 'mm', field: 'minute', digits: 2 },
  { token: 'ss', field: 'second', digits: 2 },
];

const CANONICAL_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

export interface DatetimePattern {
  readonly pattern: string;
  /** Parses `value`, returning undefined when it does not match or is not a real instant. */
  parse(value: string): Date | undefined;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Compiles a pattern once so it can be applied to many values. */
export function compileDatetimePattern(pattern: string): DatetimePattern {
  const fields: Field[] = [];
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern.charAt(i);

    if (ch === "'") {
      const end = pattern.indexOf("'", i + 1);
      if (end === i + 1) {
        source += "'";
        i += 2;
        continue;
      }
      if (end === -1) {
        throw new Error(`Unterminated quote in datetime pattern "${pattern}"`);
      }
      source += escapeRegExp(pattern.slice(i + 1, end));
      i = end + 1;
      continue;
    }

    const match = TOKENS.find((t) => pattern.startsWith(t.token, i));
    if (match) {
      if (fields.includes(match.field)) {
        throw new Error(`Datetime pattern "${pattern}" repeats ${match.token}`);
      }
      fields.push(match.field);
      source += `(\\d{${match.digits}})`;
      i += match.token.length;
      continue;
    }

    if (/[a-zA-Z]/.test(ch)) {
      throw new Error(`Unsupported letter "${ch}" in datetime pattern "${pattern}"`);
    }

    source += escapeRegExp(ch);
    i += 1;
  }

  if (!fields.includes('year') || !fields.includes('month') || !fields.includes('day')) {
    throw new Error(`Datetime pattern "${pattern}" must contain yyyy, MM and dd`);
  }

  const regex = new RegExp(`^${source}$`);

  return {
    pattern,
    parse(value: string): Date | undefined {
      const match = regex.exec(value.trim());
      if (match === null) {
        return undefined;
      }

      const parts: Record<Field, number> = {
        year: 0, month: 1, day: 1, hour: 0, minute: 0, second: 0, millis: 0,
      };
      fields.forEach((field, idx) => {
        parts[field] = Number(match[idx + 1]);
      });

      // setUTCFullYear keeps years 0-99 literal, where Date.UTC maps them to 19xx
      const date = new Date(0);
      date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
      date.setUTCHours(parts.hour, parts.minute, parts.second, parts.millis);

      // overflow rolls forward (Feb 31 -> Mar 3); reject that
      const roundTrips =
        date.getUTCFullYear() === parts.year &&
        date.getUTCMonth() === parts.month - 1 &&
        date.getUTCDate() === parts.day &&
        date.getUTCHours() === parts.hour &&
        date.getUTCMinutes() === parts.minute &&
        date.getUTCSeconds() === parts.second;

      return roundTrips ? date : undefined;
    },
  };
}

/** True when `value` is already what `toIsoTimestamp` would produce. */
export function isCanonicalTimestamp(value: string): boolean {
  if (!CANONICAL_ISO.test(value)) {
    return false;
  }
  const time = Date.parse(value);
  return !Number.isNaN(time) && new Date(time).toISOString() === value;
}
