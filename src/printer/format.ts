/**
 * Atom text formatting shared by the printer and the field coercions.
 *
 * Float text: shortest round-trip digits, fixed notation for decimal
 * exponents -4..15, otherwise scientific notation with a signed two-digit
 * exponent. The mantissa always keeps a '.' so the text re-parses as a Float.
 */

const STRING_ESCAPE_PATTERN = /[\\"\n\r\t]/g;

const ESCAPED: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

export function quoteString(text: string): string {
  return `"${text.replace(STRING_ESCAPE_PATTERN, (char) => ESCAPED[char] ?? char)}"`;
}

export function formatInteger(value: number): string {
  if (Object.is(value, -0)) return '-0';
  // String(1e21) would switch to exponent form and re-parse as a Float
  return Number.isSafeInteger(value) ? String(value) : BigInt(value).toString();
}

export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return '-0.0';
  if (value === 0) return '0.0';

  const [mantissa, exponentText] = value.toExponential().split('e');
  const exponent = parseInt(exponentText, 10);

  if (exponent >= -4 && exponent < 16) {
    const fixed = String(value);
    return fixed.includes('.') ? fixed : `${fixed}.0`;
  }

  const digits = mantissa.includes('.') ? mantissa : `${mantissa}.0`;
  const sign = exponent < 0 ? '-' : '+';
  return `${digits}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}
