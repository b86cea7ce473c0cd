/**
 * Scalar Resolution
 *
 * Interprets scalar text the way YAML readers do. The core-schema forms
 * drive plain-value resolution and emission; the wider boolean spellings
 * are accepted only when a boolean is explicitly requested.
 */

/** Prefix of the YAML 1.2 core-schema tags */
export const CORE_TAG_PREFIX = 'tag:yaml.org,2002:';
export const STRING_TAG = `${CORE_TAG_PREFIX}str`;

const NULL_TEXT = new Set(['~', 'null', 'Null', 'NULL', '']);

const CORE_TRUE = new Set(['true', 'True', 'TRUE']);
const CORE_FALSE = new Set(['false', 'False', 'FALSE']);

const LENIENT_TRUE = new Set([
  ...CORE_TRUE,
  'y',
  'Y',
  'yes',
  'Yes',
  'YES',
  'on',
  'On',
  'ON',
]);
const LENIENT_FALSE = new Set([
  ...CORE_FALSE,
  'n',
  'N',
  'no',
  'No',
  'NO',
  'off',
  'Off',
  'OFF',
]);

const DECIMAL_INT = /^[-+]?[0-9]+$/;
const HEX_INT = /^0x[0-9a-fA-F]+$/;
const OCTAL_INT = /^0o[0-7]+$/;
const FLOAT = /^[-+]?(\.[0-9]+|[0-9]+(\.[0-9]*)?)([eE][-+]?[0-9]+)?$/;
const INFINITY = /^([-+]?)\.(inf|Inf|INF)$/;
const NOT_A_NUMBER = /^\.(nan|NaN|NAN)$/;

const DATE_ONLY = /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})$/;
const DATE_TIME =
  /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})(?:[Tt]|[ \t]+)([0-9]{1,2}):([0-9]{2}):([0-9]{2})(\.[0-9]+)?[ \t]*(Z|[-+][0-9]{1,2}(?::?[0-9]{2})?)?$/;

/** Whether a scalar tag forces its text to be read as a string */
export function isStringTag(tag: string): boolean {
  return tag === '!' || tag === STRING_TAG;
}

/** Text that a plain scalar uses to spell null */
export function isNullText(text: string): boolean {
  return NULL_TEXT.has(text);
}

/** Booleans in the YAML 1.2 core schema spellings */
export function parseCoreBoolean(text: string): boolean | undefined {
  if (CORE_TRUE.has(text)) return true;
  if (CORE_FALSE.has(text)) return false;
  return undefined;
}

/** Booleans including the y/n, yes/no and on/off spellings */
export function parseBoolean(text: string): boolean | undefined {
  if (LENIENT_TRUE.has(text)) return true;
  if (LENIENT_FALSE.has(text)) return false;
  return undefined;
}

/** Integer in decimal, 0x hex or 0o octal form, of any size */
export function parseInteger(text: string): bigint | undefined {
  if (DECIMAL_INT.test(text)) {
    return BigInt(text.startsWith('+') ? text.slice(1) : text);
  }
  if (HEX_INT.test(text) || OCTAL_INT.test(text)) {
    return BigInt(text);
  }
  return undefined;
}

/** Any YAML number: integers, floats, infinities and NaN */
export function parseNumber(text: string): number | undefined {
  const integer = parseInteger(text);
  if (integer !== undefined) return Number(integer);
  if (FLOAT.test(text)) return Number(text);

  const infinity = INFINITY.exec(text);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  if (NOT_A_NUMBER.test(text)) return NaN;
  return undefined;
}

/**
 * YAML timestamp. A date alone is midnight UTC; a date-time without a
 * zone is UTC as well.
 */
export function parseTimestamp(text: string): Date | undefined {
  const dateOnly = DATE_ONLY.exec(text);
  if (dateOnly) {
    const [, year, month, day] = dateOnly;
    return validDate(utcTime(Number(year), Number(month), Number(day)));
  }

  const dateTime = DATE_TIME.exec(text);
  if (!dateTime) return undefined;

  const [, year, month, day, hour, minute, second, fraction, zone] =
    dateTime;
  const millis = fraction
    ? Math.round(Number(`0${fraction}`) * 1000)
    : 0;
  const utc = utcTime(
    Number(year),
    Number(month),
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis
  );
  return validDate(utc - zoneOffsetMinutes(zone) * 60_000);
}

/** Date.UTC without the 1900 offset for years 0-99 */
function utcTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0
): number {
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second, millis));
  date.setUTCFullYear(year, month - 1, day);
  return date.getTime();
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, digits.length > 2 ? -2 : undefined));
  const minutes = digits.length > 2 ? Number(digits.slice(-2)) : 0;
  return sign * (hours * 60 + minutes);
}

function validDate(time: number): Date | undefined {
  return Number.isNaN(time) ? undefined : new Date(time);
}

/** Value of a plain (untagged) scalar under the YAML 1.2 core schema */
export type PlainValue = null | boolean | number | bigint | string;

/**
 * Resolve plain scalar text to a JS value.
 * Integers outside the safe range resolve to bigint.
 */
export function resolvePlain(text: string): PlainValue {
  if (isNullText(text)) return null;

  const bool = parseCoreBoolean(text);
  if (bool !== undefined) return bool;

  const integer = parseInteger(text);
  if (integer !== undefined) {
    const asNumber = Number(integer);
    return Number.isSafeInteger(asNumber) ? asNumber : integer;
  }

  const number = parseNumber(text);
  if (number !== undefined) return number;

  return text;
}

/** Whether plain text would be read back as something other than a string */
export function resolvesToNonString(text: string): boolean {
  return typeof resolvePlain(text) !== 'string';
}

/** Scalar text for a number, using YAML spellings for the special values */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  return String(value);
}
