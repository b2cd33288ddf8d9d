const INTEGER_PATTERN = /^-?\d+$/;

// Census estimates come back as strings ("1234"); anything else is rejected
export function parseInteger(value: string): number | null {
  const str = value.trim();
  if (!INTEGER_PATTERN.test(str)) return null;
  const num = Number(str);
  return Number.isSafeInteger(num) ? num : null;
}
