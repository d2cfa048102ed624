import {
  CriterionDefinition,
  EvaluateOptions,
  Evaluation,
} from './compliance.types';

const TRUE_TOKENS = new Set(['yes', 'true', '1', 'pass']);
const FALSE_TOKENS = new Set(['no', 'false', '0', 'fail']);

// Plain decimal notation only: no hex, no Infinity, no NaN
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const UNKNOWN: Readonly<Evaluation> = {
  numericValue: null,
  compliance: 'unknown',
  deviation: null,
};

/**
 * Parse a decimal number. Returns null for anything that is not one,
 * including values that overflow to Infinity.
 */
export function parseNumericValue(raw: string): number | null {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseBooleanToken(raw: string): boolean | null {
  const token = raw.trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  return null;
}

/**
 * Split a multiselect value. Accepts a JSON array of strings or a
 * comma-separated list; blanks are dropped.
 */
export function parseSelection(raw: string, multiple: boolean): string[] {
  const trimmed = raw.trim();
  if (!multiple) return trimmed === '' ? [] : [trimmed];

  const fromJson = trimmed.startsWith('[') ? parseJsonStringArray(trimmed) : null;
  const parts = fromJson ?? trimmed.split(',');
  return parts.map((part) => part.trim()).filter((part) => part !== '');
}

function parseJsonStringArray(raw: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  const strings = parsed.filter(
    (entry): entry is string => typeof entry === 'string',
  );
  return strings.length === parsed.length ? strings : null;
}

/**
 * Decide the compliance of one raw value against a criterion.
 *
 * Never throws: values that cannot be interpreted come back as
 * `unknown` so a single bad cell never blocks a record.
 */
export function evaluate(
  criterion: CriterionDefinition,
  rawValue: string | null | undefined,
  options: EvaluateOptions = {},
): Evaluation {
  const raw = rawValue?.trim() ?? '';
  if (raw === '') return { ...UNKNOWN };

  switch (criterion.dataType) {
    case 'numeric':
      return evaluateNumeric(criterion, raw);
    case 'boolean':
      return evaluateBoolean(raw);
    case 'select':
    case 'multiselect':
      return evaluateSelection(
        raw,
        criterion.dataType === 'multiselect',
        options.acceptableOptions ?? criterion.acceptableOptions,
      );
    case 'text':
      return { ...UNKNOWN, compliance: options.override ?? 'unknown' };
  }
}

function evaluateNumeric(
  criterion: CriterionDefinition,
  raw: string,
): Evaluation {
  const value = parseNumericValue(raw);
  if (value === null) return { ...UNKNOWN };

  const { limitMin, limitMax } = criterion;
  if (limitMin !== null && value < limitMin) {
    return { numericValue: value, compliance: 'fail', deviation: value - limitMin };
  }
  if (limitMax !== null && value > limitMax) {
    return { numericValue: value, compliance: 'fail', deviation: value - limitMax };
  }
  return { numericValue: value, compliance: 'pass', deviation: 0 };
}

function evaluateBoolean(raw: string): Evaluation {
  const value = parseBooleanToken(raw);
  if (value === null) return { ...UNKNOWN };
  return { ...UNKNOWN, compliance: value ? 'pass' : 'fail' };
}

function evaluateSelection(
  raw: string,
  multiple: boolean,
  allowList: readonly string[] | null,
): Evaluation {
  const selected = parseSelection(raw, multiple);
  if (!allowList || allowList.length === 0 || selected.length === 0) {
    return { ...UNKNOWN };
  }
  const acceptable = new Set(allowList.map((option) => option.trim()));
  const allAcceptable = selected.every((option) => acceptable.has(option));
  return { ...UNKNOWN, compliance: allAcceptable ? 'pass' : 'fail' };
}
