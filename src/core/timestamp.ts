/**
 * strftime-style timestamp parsing, always interpreted as UTC.
 *
 * Supported directives: %Y %m %d %H %M %S %f (1-6 fractional digits) and %%.
 * Any other character in the format must match literally.
 */

type Field = "year" | "month" | "day" | "hour" | "minute" | "second" | "fraction";

const DIRECTIVES: Record<string, { field: Field; pattern: string }> = {
  Y: { field: "year", pattern: "(\\d{4})" },
  m: { field: "month", pattern: "(\\d{1,2})" },
  d: { field: "day", pattern: "(\\d{1,2})" },
  H: { field: "hour", pattern: "(\\d{1,2})" },
  M: { field: "minute", pattern: "(\\d{1,2})" },
  S: { field: "second", pattern: "(\\d{1,2})" },
  f: { field: "fraction", pattern: "(\\d{1,6})" },
};

interface CompiledFormat {
  regex: RegExp;
  fields: Field[];
}

const compiled = new Map<string, CompiledFormat>();

function escapeRegex(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/** Compile a format string; throws on an unsupported directive. */
export function compileTimestampFormat(format: string): CompiledFormat {
  const cached = compiled.get(format);
  if (cached) return cached;

  let source = "^";
  const fields: Field[] = [];
  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch !== "%") {
      source += escapeRegex(ch);
      continue;
    }
    const directive = format[i + 1];
    i++;
    if (directive === "%") {
      source += "%";
      continue;
    }
    const spec = directive === undefined ? undefined : DIRECTIVES[directive];
    if (!spec) {
      throw new SyntaxError(
        `Unsupported timestamp directive %${directive ?? ""} in "${format}"`,
      );
    }
    source += spec.pattern;
    fields.push(spec.field);
  }

  const result = { regex: new RegExp(`${source}$`), fields };
  compiled.set(format, result);
  return result;
}

/** Parse `text` with `format` as a UTC instant, or return null when it does not match. */
export function parseTimestamp(text: string, format: string): Date | null {
  const { regex, fields } = compileTimestampFormat(format);
  const match = regex.exec(text.trim());
  if (!match) return null;

  const parts: Record<Field, number> = {
    year: 1970,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    fraction: 0,
  };
  fields.forEach((field, idx) => {
    const raw = match[idx + 1];
    parts[field] =
      field === "fraction"
        ? Math.floor(Number(raw.padEnd(6, "0")) / 1000)
        : Number(raw);
  });

  const { year, month, day, hour, minute, second, fraction } = parts;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, fraction),
  );
  // Date.UTC rolls day overflow (Feb 30 -> Mar 2); reject it.
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }
  return date;
}
